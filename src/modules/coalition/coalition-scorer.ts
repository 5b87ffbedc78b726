import { getLogger } from '../../utils/logger.js';
import { clip } from '../../utils/math.js';
import type { SignalScore } from '../aggregate/signal.js';
import type { CoalitionGraph } from './graph.js';

const log = getLogger();

export interface PropagationOptions {
  /** Stop once the largest per-member change drops below this */
  tolerance?: number;
  maxIterations?: number;
  /** Confidence multiplier applied when the cap is hit before converging */
  nonConvergencePenalty?: number;
}

export const DEFAULT_PROPAGATION: Required<PropagationOptions> = {
  tolerance: 1e-4,
  maxIterations: 100,
  nonConvergencePenalty: 0.5,
};

export interface CoalitionResult {
  scores: Map<string, SignalScore>;
  iterations: number;
  converged: boolean;
  /** Max absolute change of each iteration, in order */
  residuals: number[];
}

/**
 * Propagate anchor positions across the coalition graph.
 *
 * Synchronous label propagation: every reachable non-anchor takes the
 * weighted mean of its neighbours' estimates from the previous iteration,
 * anchors stay clamped. Members with no path to an anchor get 0 / 0.
 */
export function scoreCoalition(
  graph: CoalitionGraph,
  anchors: Readonly<Record<string, number>>,
  opts: PropagationOptions = {},
): CoalitionResult {
  const { tolerance, maxIterations, nonConvergencePenalty } = { ...DEFAULT_PROPAGATION, ...opts };
  const n = graph.size;
  const adjacency = graph.adjacency();

  const isAnchor = new Array<boolean>(n).fill(false);
  let current = new Float64Array(n);

  for (const memberId of Object.keys(anchors).sort()) {
    const index = graph.indexOf(memberId);
    const value = anchors[memberId];
    if (index === undefined || value === undefined) {
      log.debug({ memberId }, 'Anchor not in coalition graph, ignoring');
      continue;
    }
    isAnchor[index] = true;
    current[index] = clip(value);
  }

  const reachable = reachableFromAnchors(adjacency, isAnchor);
  const free: number[] = [];
  for (let i = 0; i < n; i++) {
    if (reachable[i] && !isAnchor[i]) free.push(i);
  }

  const residuals: number[] = [];
  let converged = free.length === 0;
  let iterations = 0;

  while (!converged && iterations < maxIterations) {
    const next = Float64Array.from(current);
    let maxChange = 0;

    for (const i of free) {
      let weighted = 0;
      let total = 0;
      for (const { index, weight } of adjacency[i] ?? []) {
        weighted += weight * (current[index] ?? 0);
        total += weight;
      }
      // Reachable free members always have at least one edge
      const estimate = total > 0 ? weighted / total : 0;
      next[i] = estimate;
      maxChange = Math.max(maxChange, Math.abs(estimate - (current[i] ?? 0)));
    }

    current = next;
    iterations++;
    residuals.push(maxChange);
    if (maxChange < tolerance) converged = true;
  }

  if (!converged) {
    log.warn(
      { iterations, residual: residuals[residuals.length - 1], tolerance },
      'Coalition propagation hit the iteration cap before converging',
    );
  }

  const confidence = converged ? 1 : nonConvergencePenalty;
  const scores = new Map<string, SignalScore>();
  for (let i = 0; i < n; i++) {
    const memberId = graph.idAt(i);
    if (!reachable[i]) {
      scores.set(memberId, { value: 0, confidence: 0 });
    } else if (isAnchor[i]) {
      scores.set(memberId, { value: current[i] ?? 0, confidence: 1 });
    } else {
      scores.set(memberId, { value: clip(current[i] ?? 0), confidence });
    }
  }

  return { scores, iterations, converged, residuals };
}

function reachableFromAnchors(
  adjacency: ReadonlyArray<ReadonlyArray<{ index: number }>>,
  isAnchor: readonly boolean[],
): boolean[] {
  const seen = isAnchor.slice();
  const queue: number[] = [];
  isAnchor.forEach((anchor, i) => {
    if (anchor) queue.push(i);
  });

  for (let head = 0; head < queue.length; head++) {
    const i = queue[head];
    if (i === undefined) continue;
    for (const { index } of adjacency[i] ?? []) {
      if (!seen[index]) {
        seen[index] = true;
        queue.push(index);
      }
    }
  }
  return seen;
}
