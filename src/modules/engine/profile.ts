import fs from 'node:fs';
import { z } from 'zod';
import { ValidationError, toValidationIssues } from '../../utils/errors.js';
import { parseJsonStrict } from '../../utils/json.js';
import { DEFAULT_SIGNAL_WEIGHTS } from '../aggregate/score-aggregator.js';
import { DEFAULT_PROPAGATION } from '../coalition/coalition-scorer.js';
import { DEFAULT_VOTE_WEIGHT } from '../coalition/graph.js';
import { DEFAULT_MIN_VOTES } from '../votes/vote-pattern-scorer.js';

// ─── Scoring Profile Zod Schema ─────────────────────────

const zPosition = z.number().min(-1).max(1);

const SignalWeightsSchema = z
  .object({
    text: z.number().min(0),
    coalition: z.number().min(0),
    vote: z.number().min(0),
  })
  .refine(w => w.text + w.coalition + w.vote > 0, 'At least one signal weight must be positive');

export const AxisProfileSchema = z
  .object({
    anchors: z.record(z.string().min(1), zPosition).default({}),
    poles: z.object({
      poleA: z.array(z.string().min(1)).default([]),
      poleB: z.array(z.string().min(1)).optional(),
    }).default({}),
    weights: SignalWeightsSchema.default({ ...DEFAULT_SIGNAL_WEIGHTS }),
    negativeLabel: z.string().min(1).default('left'),
    positiveLabel: z.string().min(1).default('right'),
    neutralBand: z.number().min(0).max(1).default(0.3),
  })
  .refine(
    a => !a.poles.poleB || !a.poles.poleB.some(id => a.poles.poleA.includes(id)),
    { message: 'poleA and poleB must be disjoint', path: ['poles'] },
  );

export const EngineSettingsSchema = z.object({
  voteWeight: z.number().positive().default(DEFAULT_VOTE_WEIGHT),
  tolerance: z.number().positive().default(DEFAULT_PROPAGATION.tolerance),
  maxIterations: z.number().int().positive().default(DEFAULT_PROPAGATION.maxIterations),
  nonConvergencePenalty: z.number().min(0).max(1).default(DEFAULT_PROPAGATION.nonConvergencePenalty),
  minVotes: z.number().int().min(0).default(DEFAULT_MIN_VOTES),
});

export const ScoringProfileSchema = z.object({
  engine: EngineSettingsSchema.default({}),
  axes: z
    .record(z.string().min(1), AxisProfileSchema)
    .refine(axes => Object.keys(axes).length > 0, 'At least one axis is required'),
});

export type AxisProfile = z.infer<typeof AxisProfileSchema>;
export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
export type ScoringProfile = z.infer<typeof ScoringProfileSchema>;
export type ScoringProfileInput = z.input<typeof ScoringProfileSchema>;

export function parseScoringProfile(raw: unknown): ScoringProfile {
  const parsed = ScoringProfileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError('Invalid scoring profile', toValidationIssues(parsed.error.issues));
  }
  return parsed.data;
}

export function loadScoringProfile(filePath: string): ScoringProfile {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ValidationError(`Could not read scoring profile ${filePath}`, [
      { path: '', message: err instanceof Error ? err.message : String(err) },
    ]);
  }
  return parseScoringProfile(parseJsonStrict(text, 'scoring profile'));
}
