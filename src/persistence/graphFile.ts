import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";

import { ConfigurationError } from "../config/errors.js";
import { SampleGraph } from "../graph/sampleGraph.js";
import type { VertexAttributes } from "../graph/types.js";

export const GRAPH_FILE_FORMAT = "kg-sample-graph" as const;
export const GRAPH_FILE_VERSION = 1 as const;

const attributeValue = z.union([z.string(), z.number(), z.boolean()]);

const graphDocumentSchema = z
  .object({
    format: z.literal(GRAPH_FILE_FORMAT),
    version: z.literal(GRAPH_FILE_VERSION),
    metadata: z.record(z.unknown()).default({}),
    vertices: z.array(
      z
        .object({
          id: z.string().min(1),
          attributes: z.object({ language: z.string().min(1) }).catchall(attributeValue),
        })
        .strict(),
    ),
    edges: z.array(
      z
        .object({
          source: z.string().min(1),
          target: z.string().min(1),
          color: z.enum(["red", "blue"]),
        })
        .strict(),
    ),
  })
  .strict();

/** JSON document written for a sample graph. */
export type GraphDocument = z.infer<typeof graphDocumentSchema>;

/** Free-form run parameters stored next to the graph. */
export type GraphMetadata = Readonly<Record<string, unknown>>;

export function serializeGraph(graph: SampleGraph, metadata: GraphMetadata = {}): GraphDocument {
  return {
    format: GRAPH_FILE_FORMAT,
    version: GRAPH_FILE_VERSION,
    metadata: { ...metadata },
    vertices: graph.listVertices().map((vertex) => ({ id: vertex.id, attributes: definedAttributes(vertex.attributes) })),
    edges: graph.listEdges().map((edge) => ({ source: edge.source, target: edge.target, color: edge.color })),
  };
}

export interface DecodedGraph {
  readonly graph: SampleGraph;
  readonly metadata: Record<string, unknown>;
}

/**
 * Validates {@link raw} and rebuilds the graph in document order. Structural
 * problems (unknown endpoints, self loops, duplicate vertices) surface as the
 * graph's own invariant errors.
 */
export function deserializeGraph(raw: unknown): DecodedGraph {
  const parsed = graphDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      "invalid graph document",
      parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    );
  }
  const graph = new SampleGraph();
  for (const vertex of parsed.data.vertices) {
    if (!graph.addVertex(vertex.id, vertex.attributes)) {
      throw new ConfigurationError(`graph document lists vertex '${vertex.id}' twice`);
    }
  }
  for (const edge of parsed.data.edges) {
    graph.addEdge(edge.source, edge.target, edge.color);
  }
  return { graph, metadata: parsed.data.metadata };
}

/** Writes the graph as pretty-printed JSON through a temporary file. */
export async function saveGraph(path: string, graph: SampleGraph, metadata: GraphMetadata = {}): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const payload = `${JSON.stringify(serializeGraph(graph, metadata), null, 2)}\n`;
  const tempPath = `${path}.tmp`;
  try {
    await writeFile(tempPath, payload, "utf8");
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

export async function loadGraph(path: string): Promise<DecodedGraph> {
  const text = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`graph file '${path}' is not valid JSON`, [], { cause: error });
  }
  return deserializeGraph(raw);
}

export interface OutputNameParameters {
  readonly startId: string;
  readonly totalSamples: number;
  readonly invertProbability: number;
  readonly removeProbability: number;
}

/**
 * `<start>_<total>_samples_<pInvert>_inversions_<pRemove>_removals_graph.json`,
 * with path separators and whitespace in the start identifier replaced by `_`.
 */
export function buildOutputFileName(parameters: OutputNameParameters): string {
  const start = parameters.startId.replace(/[\\/:*?"<>|\s]+/g, "_");
  return (
    `${start}_${parameters.totalSamples}_samples_${parameters.invertProbability}_inversions_` +
    `${parameters.removeProbability}_removals_graph.json`
  );
}

export function resolveOutputPath(outputDir: string, parameters: OutputNameParameters): string {
  return join(outputDir, buildOutputFileName(parameters));
}

function definedAttributes(attributes: VertexAttributes): GraphDocument["vertices"][number]["attributes"] {
  const result: GraphDocument["vertices"][number]["attributes"] = { language: attributes.language };
  for (const [key, value] of Object.entries(attributes)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
