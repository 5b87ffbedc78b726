import type { AxisProfile } from '../engine/profile.js';

export const INSUFFICIENT_DATA = 'insufficient data';
export const MODERATE = 'moderate';

type LabelSettings = Pick<AxisProfile, 'negativeLabel' | 'positiveLabel' | 'neutralBand'>;

const DEFAULT_LABELS: LabelSettings = { negativeLabel: 'left', positiveLabel: 'right', neutralBand: 0.3 };

export function classifyScore(
  score: { value: number; confidence: number },
  labels: LabelSettings = DEFAULT_LABELS,
): string {
  if (score.confidence <= 0) return INSUFFICIENT_DATA;
  if (score.value > labels.neutralBand) return labels.positiveLabel;
  if (score.value < -labels.neutralBand) return labels.negativeLabel;
  return MODERATE;
}
