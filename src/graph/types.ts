/**
 * Shared type definitions describing the labeled graph produced by the
 * sampler. Vertices are keyed by their identifier alone; the language lives in
 * the attribute bag.
 */

/** The two relations a sample graph can carry. */
export type EdgeColor = "red" | "blue";

export const EDGE_COLORS: readonly EdgeColor[] = ["red", "blue"];

/** Red = same-language hyperlink; blue = cross-language translation equivalence. */
export function invertColor(color: EdgeColor): EdgeColor {
  return color === "red" ? "blue" : "red";
}

/** Allowed scalar attribute persisted on vertices. */
export type VertexAttributeValue = string | number | boolean;

/** Attribute bag attached to every vertex. `language` is always present. */
export interface VertexAttributes {
  readonly language: string;
  readonly color?: string;
  readonly shape?: string;
  readonly summary?: string;
  readonly [key: string]: VertexAttributeValue | undefined;
}

export interface VertexRecord {
  readonly id: string;
  readonly attributes: VertexAttributes;
}

/**
 * Undirected edge. `source`/`target` keep the orientation of the first
 * insertion, which only matters for stable output ordering.
 */
export interface EdgeRecord {
  readonly source: string;
  readonly target: string;
  readonly color: EdgeColor;
}

/** Unordered identifier pair as produced by the crawl and clique stages. */
export type VertexPair = readonly [string, string];
