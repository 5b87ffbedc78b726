import { clip, safeDivide } from '../../utils/math.js';
import type { TextScore } from '../text/text-scorer.js';
import { NO_SIGNAL, type SignalScore } from './signal.js';

export type SignalName = 'text' | 'coalition' | 'vote';

export type SignalWeights = Record<SignalName, number>;

export const DEFAULT_SIGNAL_WEIGHTS: Readonly<SignalWeights> = Object.freeze({
  text: 1 / 3,
  coalition: 1 / 3,
  vote: 1 / 3,
});

export const SIGNAL_NAMES: readonly SignalName[] = ['text', 'coalition', 'vote'];

export type ComponentScores = Record<SignalName, SignalScore>;

export interface AggregateResult extends SignalScore {
  components: ComponentScores;
}

/**
 * Collapse a member's per-document text scores into one signal.
 * The value is the coverage-weighted mean; confidence is 1 − Π(1 − coverage),
 * so each matched document adds evidence and none can push it past 1.
 */
export function combineTextScores(scores: readonly TextScore[]): SignalScore {
  let weighted = 0;
  let totalCoverage = 0;
  let missing = 1;

  // Callers pass documents in id order; sums follow that order
  for (const s of scores) {
    if (!(s.coverage > 0)) continue;
    weighted += s.coverage * s.score;
    totalCoverage += s.coverage;
    missing *= 1 - clip(s.coverage, 0, 1);
  }

  if (totalCoverage === 0) return { ...NO_SIGNAL };
  return {
    value: clip(safeDivide(weighted, totalCoverage)),
    confidence: clip(1 - missing, 0, 1),
  };
}

/**
 * Weighted mean of the three signals, each weight scaled by its signal's
 * confidence and re-normalised. Signals with confidence 0 drop out instead of
 * dragging the mean toward 0. The aggregate confidence is the share of the
 * configured weight that survived.
 */
export function aggregateSignals(
  components: Partial<ComponentScores>,
  weights: Readonly<SignalWeights> = DEFAULT_SIGNAL_WEIGHTS,
): AggregateResult {
  const full: ComponentScores = {
    text: components.text ?? { ...NO_SIGNAL },
    coalition: components.coalition ?? { ...NO_SIGNAL },
    vote: components.vote ?? { ...NO_SIGNAL },
  };

  let weightSum = 0;
  let multiplierSum = 0;
  let weighted = 0;

  for (const name of SIGNAL_NAMES) {
    const weight = Math.max(0, weights[name]);
    const signal = full[name];
    // A value that cannot be read carries no evidence, whatever its confidence says
    const readable = Number.isFinite(signal.value) && Number.isFinite(signal.confidence);
    const confidence = readable ? clip(signal.confidence, 0, 1) : 0;
    const value = readable ? clip(signal.value) : 0;
    const multiplier = weight * confidence;

    weightSum += weight;
    multiplierSum += multiplier;
    weighted += multiplier * value;
  }

  if (multiplierSum === 0) {
    return { value: 0, confidence: 0, components: full };
  }

  return {
    value: clip(safeDivide(weighted, multiplierSum)),
    confidence: clip(safeDivide(multiplierSum, weightSum), 0, 1),
    components: full,
  };
}
