import { describe, it, afterEach, beforeEach } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { ConfigurationError } from "../../../src/config/errors.js";
import { GraphInvariantError } from "../../../src/graph/errors.js";
import { SampleGraph } from "../../../src/graph/sampleGraph.js";
import {
  buildOutputFileName,
  deserializeGraph,
  loadGraph,
  resolveOutputPath,
  saveGraph,
  serializeGraph,
} from "../../../src/persistence/graphFile.js";
import { expectRejection, expectThrow } from "../../helpers/assertions.js";

function sampleGraph(): SampleGraph {
  const graph = new SampleGraph();
  graph.addVertex("A", { language: "en", color: "#112233", summary: "First." });
  graph.addVertex("C", { language: "en", color: "#112233" });
  graph.addVertex("B", { language: "fr", color: "#445566", shape: "s", weight: 2, seed: true });
  graph.addEdge("A", "C", "red");
  graph.addEdge("A", "B", "blue");
  return graph;
}

describe("persistence/graphFile", () => {
  let workdir: string;

  beforeEach(async () => {
    workdir = await mkdtemp(join(tmpdir(), "kg-graph-"));
  });

  afterEach(async () => {
    await rm(workdir, { recursive: true, force: true });
  });

  it("serialises vertices, attributes and edge colors", () => {
    const document = serializeGraph(sampleGraph(), { seed: "7" });
    expect(document.format).to.equal("kg-sample-graph");
    expect(document.version).to.equal(1);
    expect(document.metadata).to.deep.equal({ seed: "7" });
    expect(document.vertices[2]).to.deep.equal({
      id: "B",
      attributes: { language: "fr", color: "#445566", shape: "s", weight: 2, seed: true },
    });
    expect(document.edges).to.deep.equal([
      { source: "A", target: "C", color: "red" },
      { source: "A", target: "B", color: "blue" },
    ]);
  });

  it("round-trips through disk without losing attributes or colors", async () => {
    const graph = sampleGraph();
    const path = join(workdir, "nested", "graph.json");
    await saveGraph(path, graph, { languages: ["en", "fr"] });

    const { graph: loaded, metadata } = await loadGraph(path);
    expect(loaded.listVertices()).to.deep.equal(graph.listVertices());
    expect(loaded.listEdges()).to.deep.equal(graph.listEdges());
    expect(metadata).to.deep.equal({ languages: ["en", "fr"] });
    expect(await readdir(join(workdir, "nested"))).to.deep.equal(["graph.json"]);
    expect((await readFile(path, "utf8")).endsWith("\n")).to.equal(true);
  });

  it("rejects documents with an unknown format or version", () => {
    const document = { ...serializeGraph(sampleGraph()), version: 2 };
    const error = expectThrow(() => deserializeGraph(document), ConfigurationError);
    expect(error.issues[0]?.path).to.equal("version");
  });

  it("rejects invalid edge colors", () => {
    const document = serializeGraph(sampleGraph());
    const broken = { ...document, edges: [{ source: "A", target: "C", color: "green" }] };
    const error = expectThrow(() => deserializeGraph(broken), ConfigurationError);
    expect(error.issues[0]?.path).to.equal("edges.0.color");
  });

  it("rejects edges towards unknown vertices", () => {
    const document = serializeGraph(sampleGraph());
    const broken = { ...document, edges: [{ source: "A", target: "Z", color: "red" }] };
    expectThrow(() => deserializeGraph(broken), GraphInvariantError);
  });

  it("rejects duplicated vertices", () => {
    const document = serializeGraph(sampleGraph());
    const broken = { ...document, vertices: [...document.vertices, { id: "A", attributes: { language: "fr" } }] };
    const error = expectThrow(() => deserializeGraph(broken), ConfigurationError);
    expect(error.message).to.equal("graph document lists vertex 'A' twice");
  });

  it("reports files that are not JSON", async () => {
    const path = join(workdir, "broken.json");
    await writeFile(path, "{ nope", "utf8");
    const error = await expectRejection(loadGraph(path), ConfigurationError);
    expect(error.message).to.equal(`graph file '${path}' is not valid JSON`);
  });

  it("derives the output file name from the run parameters", () => {
    const parameters = { startId: "Mathematics", totalSamples: 300, invertProbability: 0.1, removeProbability: 0.8 };
    expect(buildOutputFileName(parameters)).to.equal(
      "Mathematics_300_samples_0.1_inversions_0.8_removals_graph.json",
    );
    expect(buildOutputFileName({ ...parameters, startId: "Set theory/Axioms" })).to.equal(
      "Set_theory_Axioms_300_samples_0.1_inversions_0.8_removals_graph.json",
    );
    expect(resolveOutputPath("out", parameters)).to.equal(
      join("out", "Mathematics_300_samples_0.1_inversions_0.8_removals_graph.json"),
    );
  });
});
