import type { StructuredLogger } from "../logger.js";
import { edgeKey } from "../graph/sampleGraph.js";
import type { VertexPair } from "../graph/types.js";
import { isNotFoundError } from "../providers/errors.js";
import type { LinkProvider } from "../providers/types.js";
import { throwIfCancelled } from "./errors.js";
import { sampleInOrder, type RandomSource } from "./random.js";

/**
 * How the crawler trims a link list that does not fit the remaining budget:
 * `prefix` keeps the first links in provider order, `random` keeps a uniform
 * random subset (still in provider order) drawn from the injected source.
 */
export type TruncationMode = "prefix" | "random";

export const TRUNCATION_MODES: readonly TruncationMode[] = ["prefix", "random"];

export interface CrawlOptions {
  readonly startId: string;
  readonly language: string;
  /** Upper bound on the size of the returned vertex set. */
  readonly maxVertices: number;
  /** Cap applied to each provider link list before budget truncation. */
  readonly maxLinksPerExpansion?: number | null;
  readonly truncation?: TruncationMode;
  /** Required when {@link truncation} is `random`. */
  readonly rng?: RandomSource;
  readonly signal?: AbortSignal;
  readonly logger?: StructuredLogger;
}

export interface CrawlResult {
  readonly language: string;
  readonly startId: string;
  /** Discovered identifiers in discovery order. */
  readonly vertices: string[];
  /** Red edges `(expanded, link)`, each unordered pair at most once. */
  readonly edges: VertexPair[];
  /** Number of documents whose links were fetched. */
  readonly expansions: number;
  /** Identifiers dropped because the provider reported them missing. */
  readonly missing: string[];
}

/**
 * Bounded breadth-first crawl of one language. The frontier is FIFO and
 * every identifier is expanded at most once, so the crawl performs at most
 * `maxVertices` expansions. `ProviderError`s and cancellations propagate and
 * the partial state is dropped with the stack frame.
 */
export async function crawlLanguage(provider: LinkProvider, options: CrawlOptions): Promise<CrawlResult> {
  const { startId, language, maxVertices } = options;
  if (!Number.isInteger(maxVertices) || maxVertices < 1) {
    throw new RangeError(`maxVertices must be a positive integer (received ${maxVertices})`);
  }
  const truncation = options.truncation ?? "prefix";
  const rng = options.rng;
  if (truncation === "random" && !rng) {
    throw new TypeError("random truncation requires a random source");
  }

  const select = (links: string[], count: number): string[] => {
    if (links.length <= count) {
      return links;
    }
    return truncation === "random" && rng ? sampleInOrder(rng, links, count) : links.slice(0, count);
  };

  const vertexSet = new Set<string>();
  const visited = new Set<string>();
  const frontier: string[] = [startId];
  const edges = new Map<string, VertexPair>();
  const missing: string[] = [];
  let expansions = 0;

  options.logger?.debug("crawl_started", { start_id: startId, max_vertices: maxVertices, truncation });

  // Head index instead of Array#shift keeps dequeues O(1).
  let head = 0;
  while (head < frontier.length && vertexSet.size < maxVertices) {
    const current = frontier[head];
    head += 1;
    if (visited.has(current)) {
      continue;
    }
    visited.add(current);
    vertexSet.add(current);

    throwIfCancelled(options.signal, language);
    let links: string[];
    try {
      links = await provider.getLinks(current, language, { signal: options.signal });
    } catch (error) {
      if (isNotFoundError(error)) {
        dropVertex(current, vertexSet, edges);
        missing.push(current);
        options.logger?.warn("crawl_vertex_missing", { id: current });
        continue;
      }
      throwIfCancelled(options.signal, language);
      throw error;
    }
    expansions += 1;

    if (options.maxLinksPerExpansion && options.maxLinksPerExpansion > 0) {
      links = select(links, options.maxLinksPerExpansion);
    }

    const known: string[] = [];
    const fresh = new Set<string>();
    for (const link of links) {
      if (link === current) {
        continue;
      }
      if (vertexSet.has(link)) {
        known.push(link);
      } else if (!visited.has(link)) {
        fresh.add(link);
      }
    }

    for (const link of known) {
      recordEdge(edges, current, link);
    }
    const admitted = select(Array.from(fresh), maxVertices - vertexSet.size);
    for (const link of admitted) {
      vertexSet.add(link);
      frontier.push(link);
      recordEdge(edges, current, link);
    }
  }

  const result: CrawlResult = {
    language,
    startId,
    vertices: Array.from(vertexSet),
    edges: Array.from(edges.values()),
    expansions,
    missing,
  };
  options.logger?.info("crawl_completed", {
    start_id: startId,
    vertices: result.vertices.length,
    edges: result.edges.length,
    expansions,
    missing: missing.length,
  });
  return result;
}

/** Records the undirected pair once, keeping the orientation of its first sighting. */
function recordEdge(edges: Map<string, VertexPair>, from: string, to: string): void {
  if (from === to) {
    return;
  }
  const key = edgeKey(from, to);
  if (!edges.has(key)) {
    edges.set(key, [from, to]);
  }
}

/** Removes a missing document and every edge already recorded towards it. */
function dropVertex(id: string, vertexSet: Set<string>, edges: Map<string, VertexPair>): void {
  vertexSet.delete(id);
  for (const [key, [a, b]] of edges) {
    if (a === id || b === id) {
      edges.delete(key);
    }
  }
}
