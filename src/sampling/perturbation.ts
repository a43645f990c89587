import type { StructuredLogger } from "../logger.js";
import type { SampleGraph } from "../graph/sampleGraph.js";
import { bernoulli, type RandomSource } from "./random.js";

export interface PerturbationOptions {
  /** Probability of flipping an edge's color. */
  readonly invertProbability: number;
  /** Probability of deleting an edge. */
  readonly removeProbability: number;
  readonly rng: RandomSource;
  readonly logger?: StructuredLogger;
}

export interface PerturbationStats {
  readonly examined: number;
  readonly inverted: number;
  readonly removed: number;
  /** Edges that were inverted and then removed. */
  readonly invertedThenRemoved: number;
}

export interface PerturbationResult {
  readonly graph: SampleGraph;
  readonly stats: PerturbationStats;
}

function assertProbability(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`${name} must be a probability in [0, 1] (received ${value})`);
  }
}

/**
 * Returns a perturbed copy of {@link graph}; the input is left untouched.
 *
 * Edges are visited over a snapshot taken before any mutation. For each edge
 * two independent draws are taken, inversion first and removal second, and
 * both are always drawn so the random stream stays aligned with the edge
 * order whatever the outcomes. With both probabilities at 0 the copy equals
 * the input.
 */
export function perturbGraph(graph: SampleGraph, options: PerturbationOptions): PerturbationResult {
  assertProbability("invertProbability", options.invertProbability);
  assertProbability("removeProbability", options.removeProbability);

  const result = graph.clone();
  const snapshot = result.listEdges();
  let inverted = 0;
  let removed = 0;
  let invertedThenRemoved = 0;

  for (const edge of snapshot) {
    const invert = bernoulli(options.rng, options.invertProbability);
    const remove = bernoulli(options.rng, options.removeProbability);
    if (invert) {
      result.invertEdge(edge.source, edge.target);
      inverted += 1;
    }
    if (remove) {
      result.removeEdge(edge.source, edge.target);
      removed += 1;
      if (invert) {
        invertedThenRemoved += 1;
      }
    }
  }

  const stats: PerturbationStats = { examined: snapshot.length, inverted, removed, invertedThenRemoved };
  options.logger?.info("perturbation_applied", {
    invert_probability: options.invertProbability,
    remove_probability: options.removeProbability,
    examined: stats.examined,
    inverted,
    removed,
    remaining_edges: result.edgeCount,
  });
  return { graph: result, stats };
}
