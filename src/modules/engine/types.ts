import type { ComponentScores } from '../aggregate/score-aggregator.js';
import type { TopicScore } from '../aggregate/topics.js';
import type { TimeWindow } from '../records/types.js';

/** The engine's sole output artifact. Stored append-only, one version per run. */
export interface AlignmentScore {
  memberId: string;
  axis: string;
  window: TimeWindow;
  /** In [-1, 1]; sign convention fixed per axis by the scoring profile */
  value: number;
  /** In [0, 1] */
  confidence: number;
  components: ComponentScores;
  /** Text score per document topic tag, sorted by tag */
  topics: TopicScore[];
  lexiconVersion: string;
  computedAt: Date;
}
