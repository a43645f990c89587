import { describe, it } from "mocha";
import { expect } from "chai";

import { SampleGraph } from "../../../src/graph/sampleGraph.js";
import { perturbGraph } from "../../../src/sampling/perturbation.js";
import { createSeededRandom, type RandomSource } from "../../../src/sampling/random.js";

function chain(length: number): SampleGraph {
  const graph = new SampleGraph();
  for (let index = 0; index < length; index += 1) {
    graph.addVertex(`v${index}`, { language: index % 2 === 0 ? "en" : "fr" });
  }
  for (let index = 1; index < length; index += 1) {
    graph.addEdge(`v${index - 1}`, `v${index}`, index % 2 === 0 ? "red" : "blue");
  }
  return graph;
}

/** Replays a fixed list of draws. */
function scripted(values: number[]): RandomSource & { consumed: () => number } {
  let position = 0;
  return {
    next: () => {
      const value = values[position % values.length];
      position += 1;
      return value;
    },
    consumed: () => position,
  };
}

describe("sampling/perturbation", () => {
  it("is the identity with both probabilities at zero", () => {
    const graph = chain(5);
    const { graph: result, stats } = perturbGraph(graph, {
      invertProbability: 0,
      removeProbability: 0,
      rng: createSeededRandom(1),
    });
    expect(result.listEdges()).to.deep.equal(graph.listEdges());
    expect(result.listVertices()).to.deep.equal(graph.listVertices());
    expect(stats).to.deep.equal({ examined: 4, inverted: 0, removed: 0, invertedThenRemoved: 0 });
  });

  it("leaves the input graph untouched", () => {
    const graph = chain(4);
    const before = graph.listEdges();
    perturbGraph(graph, { invertProbability: 1, removeProbability: 1, rng: createSeededRandom(1) });
    expect(graph.listEdges()).to.deep.equal(before);
  });

  it("inverts before removing and draws twice per edge", () => {
    // Edge 1: invert only. Edge 2: remove only. Edge 3: both.
    const rng = scripted([0.1, 0.9, 0.9, 0.1, 0.1, 0.1]);
    const { graph, stats } = perturbGraph(chain(4), { invertProbability: 0.5, removeProbability: 0.5, rng });

    expect(rng.consumed()).to.equal(6);
    expect(graph.listEdges()).to.deep.equal([{ source: "v0", target: "v1", color: "red" }]);
    expect(stats).to.deep.equal({ examined: 3, inverted: 2, removed: 2, invertedThenRemoved: 1 });
  });

  it("never changes the edge count when only inverting", () => {
    const graph = chain(8);
    const { graph: result } = perturbGraph(graph, {
      invertProbability: 0.5,
      removeProbability: 0,
      rng: createSeededRandom(4),
    });
    expect(result.edgeCount).to.equal(graph.edgeCount);
  });

  it("inverts every edge at probability one", () => {
    const { graph } = perturbGraph(chain(3), { invertProbability: 1, removeProbability: 0, rng: createSeededRandom(2) });
    expect(graph.listEdges().map((edge) => edge.color)).to.deep.equal(["red", "blue"]);
  });

  it("reproduces the same output for the same seed", () => {
    const options = { invertProbability: 0.3, removeProbability: 0.4 };
    const first = perturbGraph(chain(20), { ...options, rng: createSeededRandom("seed") });
    const second = perturbGraph(chain(20), { ...options, rng: createSeededRandom("seed") });
    expect(first.graph.listEdges()).to.deep.equal(second.graph.listEdges());
  });

  it("rejects probabilities outside [0, 1]", () => {
    const rng = createSeededRandom(1);
    expect(() => perturbGraph(chain(2), { invertProbability: 1.5, removeProbability: 0, rng })).to.throw(RangeError);
    expect(() => perturbGraph(chain(2), { invertProbability: 0, removeProbability: -0.1, rng })).to.throw(RangeError);
    expect(() => perturbGraph(chain(2), { invertProbability: Number.NaN, removeProbability: 0, rng })).to.throw(
      RangeError,
    );
  });
});
