import { describe, expect, it } from 'vitest';
import { scoreCoalition } from './coalition-scorer.js';
import { CoalitionGraph } from './graph.js';

function graphOf(members: string[], edges: Array<[string, string, number]>): CoalitionGraph {
  const graph = new CoalitionGraph(members);
  for (const [a, b, w] of edges) graph.addWeight(a, b, w);
  return graph;
}

// A(+1) - X - Y - B(-1)
const path = () =>
  graphOf(['A', 'B', 'X', 'Y'], [
    ['A', 'X', 1],
    ['X', 'Y', 1],
    ['Y', 'B', 1],
  ]);

describe('scoreCoalition', () => {
  it('copies the anchor onto a lone neighbour', () => {
    const result = scoreCoalition(graphOf(['A', 'B'], [['A', 'B', 1]]), { A: 0.5 });

    expect(result.scores.get('B')).toEqual({ value: 0.5, confidence: 1 });
    expect(result.scores.get('A')).toEqual({ value: 0.5, confidence: 1 });
    expect(result.residuals).toEqual([0.5, 0]);
    expect(result.iterations).toBe(2);
    expect(result.converged).toBe(true);
  });

  it('converges to the harmonic solution between two anchors', () => {
    const result = scoreCoalition(path(), { A: 1, B: -1 });

    expect(result.converged).toBe(true);
    expect(result.iterations).toBe(14);
    expect(result.scores.get('X')?.value).toBeCloseTo(1 / 3, 4);
    expect(result.scores.get('Y')?.value).toBeCloseTo(-1 / 3, 4);
    expect(result.scores.get('X')?.confidence).toBe(1);
    expect(result.scores.get('A')?.value).toBe(1);
    expect(result.scores.get('B')?.value).toBe(-1);
  });

  it('shrinks the residual every iteration on this path', () => {
    const { residuals } = scoreCoalition(path(), { A: 1, B: -1 });
    for (let i = 1; i < residuals.length; i++) {
      expect(residuals[i]).toBeLessThan(residuals[i - 1] ?? Infinity);
    }
    expect(residuals[residuals.length - 1]).toBeLessThan(1e-4);
  });

  it('never lets the residual grow on a weighted mesh', () => {
    const graph = graphOf(['A', 'B', 'C', 'D', 'E'], [
      ['A', 'B', 1],
      ['B', 'C', 2],
      ['C', 'D', 1],
      ['B', 'D', 1],
      ['D', 'E', 3],
      ['C', 'E', 0.5],
    ]);
    const { residuals, converged } = scoreCoalition(graph, { A: 1, E: -1 });

    expect(converged).toBe(true);
    for (let i = 1; i < residuals.length; i++) {
      expect(residuals[i]).toBeLessThanOrEqual((residuals[i - 1] ?? Infinity) + 1e-12);
    }
  });

  it('gives members with no path to an anchor 0 / 0', () => {
    const graph = graphOf(['A', 'B', 'C', 'D'], [
      ['A', 'B', 1],
      ['C', 'D', 4],
    ]);
    const result = scoreCoalition(graph, { A: -0.6 });

    expect(result.scores.get('B')).toEqual({ value: -0.6, confidence: 1 });
    expect(result.scores.get('C')).toEqual({ value: 0, confidence: 0 });
    expect(result.scores.get('D')).toEqual({ value: 0, confidence: 0 });
  });

  it('treats a graph without anchors as fully unreachable', () => {
    const result = scoreCoalition(path(), {});
    expect(result.iterations).toBe(0);
    expect(result.converged).toBe(true);
    for (const score of result.scores.values()) expect(score).toEqual({ value: 0, confidence: 0 });
  });

  it('ignores anchors that are not in the graph', () => {
    const result = scoreCoalition(graphOf(['A', 'B'], [['A', 'B', 1]]), { A: 0.2, Z: 1 });
    expect(result.scores.has('Z')).toBe(false);
    expect(result.scores.get('B')?.value).toBe(0.2);
  });

  it('keeps anchors clamped to [-1, 1]', () => {
    const result = scoreCoalition(graphOf(['A', 'B'], [['A', 'B', 1]]), { A: 4 });
    expect(result.scores.get('A')?.value).toBe(1);
    expect(result.scores.get('B')?.value).toBe(1);
  });

  it('discounts confidence when the iteration cap is hit', () => {
    const result = scoreCoalition(path(), { A: 1, B: -1 }, { maxIterations: 3, nonConvergencePenalty: 0.5 });

    expect(result.converged).toBe(false);
    expect(result.iterations).toBe(3);
    expect(result.residuals).toEqual([0.5, 0.25, 0.125]);
    expect(result.scores.get('X')).toEqual({ value: 0.375, confidence: 0.5 });
    expect(result.scores.get('A')?.confidence).toBe(1);
  });

  it('is bit-for-bit reproducible regardless of edge insertion order', () => {
    const edges: Array<[string, string, number]> = [
      ['A', 'B', 1],
      ['B', 'C', 2],
      ['C', 'D', 1],
      ['B', 'D', 3],
      ['D', 'E', 1],
    ];
    const first = scoreCoalition(graphOf(['A', 'B', 'C', 'D', 'E'], edges), { A: 0.9, E: -0.4 });
    const second = scoreCoalition(graphOf(['E', 'D', 'C', 'B', 'A'], [...edges].reverse()), { E: -0.4, A: 0.9 });

    expect(second.iterations).toBe(first.iterations);
    for (const [id, score] of first.scores) {
      expect(second.scores.get(id)?.value).toBe(score.value);
    }
  });
});
