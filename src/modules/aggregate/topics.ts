import type { TextScore } from '../text/text-scorer.js';
import { combineTextScores } from './score-aggregator.js';

export interface TopicScore {
  topic: string;
  /** Documents in the window carrying this tag, matched or not */
  documents: number;
  /** Coverage-weighted text score of those documents */
  value: number;
  confidence: number;
}

export interface TopicEvidence {
  topics: readonly string[];
  score: TextScore;
}

/**
 * Break a member's text evidence down by the topic tags of its documents.
 * A document with several tags counts toward each of them. Topics come back
 * sorted by tag.
 */
export function breakdownByTopic(evidence: readonly TopicEvidence[]): TopicScore[] {
  const byTopic = new Map<string, TextScore[]>();
  for (const { topics, score } of evidence) {
    for (const topic of new Set(topics.map(t => t.trim()).filter(t => t.length > 0))) {
      const list = byTopic.get(topic);
      if (list) list.push(score);
      else byTopic.set(topic, [score]);
    }
  }

  return [...byTopic.keys()].sort().map(topic => {
    const scores = byTopic.get(topic) ?? [];
    const { value, confidence } = combineTextScores(scores);
    return { topic, documents: scores.length, value, confidence };
  });
}
