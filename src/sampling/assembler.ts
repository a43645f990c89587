import type { StructuredLogger } from "../logger.js";
import { SampleGraph } from "../graph/sampleGraph.js";
import type { EdgeColor, VertexAttributes, VertexPair } from "../graph/types.js";
import { randomHexColor, type RandomSource } from "./random.js";

/**
 * Which color an identifier pair keeps when it is both a hyperlink and a
 * translation equivalence. `blue-wins` reproduces "blue inserted after red
 * overwrites"; `red-wins` keeps the hyperlink.
 */
export type ColorConflictPolicy = "blue-wins" | "red-wins";

export const COLOR_CONFLICT_POLICIES: readonly ColorConflictPolicy[] = ["blue-wins", "red-wins"];

export interface LanguageVertices {
  readonly language: string;
  readonly vertices: readonly string[];
}

export interface AssembleOptions {
  readonly colorConflict?: ColorConflictPolicy;
  /** Vertex color per language. */
  readonly palette?: ReadonlyMap<string, string>;
  /** Optional display shape per language. */
  readonly shapes?: ReadonlyMap<string, string>;
  /** Captured summaries keyed by vertex identifier. */
  readonly summaries?: ReadonlyMap<string, string>;
  readonly logger?: StructuredLogger;
}

export interface AssemblyStats {
  readonly vertices: number;
  /** Identifiers already claimed by an earlier language. */
  readonly languageCollisions: number;
  readonly redEdges: number;
  readonly blueEdges: number;
  /** Pairs offered as both red and blue. */
  readonly colorConflicts: number;
  /** Pairs dropped because an endpoint is unknown or both endpoints are equal. */
  readonly skippedEdges: number;
}

export interface AssemblyResult {
  readonly graph: SampleGraph;
  readonly stats: AssemblyStats;
}

/**
 * Merges the per-language vertex sets and both edge kinds into one graph.
 * Vertices are inserted in the given language order and an identifier keeps
 * the first language that claimed it. Red edges go in before blue edges; the
 * color of a pair offered as both follows {@link AssembleOptions.colorConflict}.
 */
export function assembleGraph(
  perLanguageVertices: readonly LanguageVertices[],
  redEdges: Iterable<VertexPair>,
  blueEdges: Iterable<VertexPair>,
  options: AssembleOptions = {},
): AssemblyResult {
  const policy = options.colorConflict ?? "blue-wins";
  const graph = new SampleGraph();
  let languageCollisions = 0;

  for (const { language, vertices } of perLanguageVertices) {
    for (const id of vertices) {
      const added = graph.addVertex(id, vertexAttributes(id, language, options));
      if (!added && graph.getVertex(id)?.attributes.language !== language) {
        languageCollisions += 1;
        options.logger?.warn("vertex_language_collision", {
          id,
          language,
          kept_language: graph.getVertex(id)?.attributes.language,
        });
      }
    }
  }

  let skippedEdges = 0;
  let colorConflicts = 0;
  const insert = (pair: VertexPair, color: EdgeColor): void => {
    const [a, b] = pair;
    if (a === b || !graph.hasVertex(a) || !graph.hasVertex(b)) {
      skippedEdges += 1;
      return;
    }
    const existing = graph.getEdge(a, b);
    if (existing && existing.color !== color) {
      colorConflicts += 1;
      if (policy === "red-wins" && color === "blue") {
        return;
      }
    }
    graph.addEdge(a, b, color);
  };

  for (const pair of redEdges) {
    insert(pair, "red");
  }
  for (const pair of blueEdges) {
    insert(pair, "blue");
  }

  const colors = graph.countEdgesByColor();
  const stats: AssemblyStats = {
    vertices: graph.vertexCount,
    languageCollisions,
    redEdges: colors.red,
    blueEdges: colors.blue,
    colorConflicts,
    skippedEdges,
  };
  options.logger?.info("graph_assembled", {
    vertices: stats.vertices,
    red_edges: stats.redEdges,
    blue_edges: stats.blueEdges,
    color_conflicts: colorConflicts,
    color_conflict_policy: policy,
    skipped_edges: skippedEdges,
    language_collisions: languageCollisions,
  });
  return { graph, stats };
}

/** Attribute bag of one vertex; color, shape and summary only when known. */
function vertexAttributes(id: string, language: string, options: AssembleOptions): VertexAttributes {
  const color = options.palette?.get(language);
  const shape = options.shapes?.get(language);
  const summary = options.summaries?.get(id);
  return {
    language,
    ...(color !== undefined ? { color } : {}),
    ...(shape !== undefined ? { shape } : {}),
    ...(summary !== undefined ? { summary } : {}),
  };
}

/**
 * One `#RRGGBB` color per language, drawn in language order from
 * {@link rng}. Explicit {@link overrides} win and do not consume draws.
 */
export function buildLanguagePalette(
  languages: readonly string[],
  rng: RandomSource,
  overrides: Readonly<Partial<Record<string, string>>> = {},
): Map<string, string> {
  const palette = new Map<string, string>();
  for (const language of languages) {
    const override = overrides[language];
    palette.set(language, override ?? randomHexColor(rng));
  }
  return palette;
}
