import { GraphInvariantError } from "./errors.js";
import {
  invertColor,
  type EdgeColor,
  type EdgeRecord,
  type VertexAttributes,
  type VertexRecord,
} from "./types.js";

/** Separator used to build canonical edge keys; titles never contain NUL. */
const KEY_SEPARATOR = "\u0000";

/** Canonical key of the unordered pair `{a, b}`. */
export function edgeKey(a: string, b: string): string {
  return a < b ? `${a}${KEY_SEPARATOR}${b}` : `${b}${KEY_SEPARATOR}${a}`;
}

/** Outcome of {@link SampleGraph.addEdge}. */
export type EdgeInsertOutcome = "added" | "recoloured" | "unchanged";

/**
 * Simple undirected graph with two edge colors. Insertion follows set
 * semantics: re-adding a vertex is a no-op and re-adding an edge only updates
 * its color, so the structure never holds parallel edges or self loops.
 * Iteration follows insertion order.
 */
export class SampleGraph {
  private readonly vertices = new Map<string, VertexRecord>();
  private readonly edges = new Map<string, EdgeRecord>();
  private readonly adjacency = new Map<string, Set<string>>();

  get vertexCount(): number {
    return this.vertices.size;
  }

  get edgeCount(): number {
    return this.edges.size;
  }

  /** Adds the vertex unless the identifier is already present. Returns whether it was added. */
  addVertex(id: string, attributes: VertexAttributes): boolean {
    if (this.vertices.has(id)) {
      return false;
    }
    this.vertices.set(id, { id, attributes: { ...attributes } });
    this.adjacency.set(id, new Set());
    return true;
  }

  hasVertex(id: string): boolean {
    return this.vertices.has(id);
  }

  getVertex(id: string): VertexRecord | undefined {
    return this.vertices.get(id);
  }

  listVertices(): VertexRecord[] {
    return Array.from(this.vertices.values());
  }

  /**
   * Inserts the edge `{a, b}` or, when present, sets its color (last write
   * wins). Both endpoints must exist and differ.
   */
  addEdge(a: string, b: string, color: EdgeColor): EdgeInsertOutcome {
    if (a === b) {
      throw new GraphInvariantError("self_loop", `edge '${a}'-'${b}' would be a self loop`, { vertex: a });
    }
    for (const endpoint of [a, b]) {
      if (!this.vertices.has(endpoint)) {
        throw new GraphInvariantError("unknown_vertex", `edge endpoint '${endpoint}' is not a vertex`, {
          vertex: endpoint,
        });
      }
    }
    const key = edgeKey(a, b);
    const existing = this.edges.get(key);
    if (existing) {
      if (existing.color === color) {
        return "unchanged";
      }
      this.edges.set(key, { ...existing, color });
      return "recoloured";
    }
    this.edges.set(key, { source: a, target: b, color });
    this.adjacency.get(a)?.add(b);
    this.adjacency.get(b)?.add(a);
    return "added";
  }

  hasEdge(a: string, b: string): boolean {
    return this.edges.has(edgeKey(a, b));
  }

  getEdge(a: string, b: string): EdgeRecord | undefined {
    return this.edges.get(edgeKey(a, b));
  }

  /** Flips the color of an existing edge and returns the new color. */
  invertEdge(a: string, b: string): EdgeColor {
    const key = edgeKey(a, b);
    const existing = this.edges.get(key);
    if (!existing) {
      throw new GraphInvariantError("unknown_edge", `edge '${a}'-'${b}' does not exist`, { source: a, target: b });
    }
    const color = invertColor(existing.color);
    this.edges.set(key, { ...existing, color });
    return color;
  }

  /** Deletes the edge `{a, b}`. Returns whether an edge was removed. */
  removeEdge(a: string, b: string): boolean {
    const removed = this.edges.delete(edgeKey(a, b));
    if (removed) {
      this.adjacency.get(a)?.delete(b);
      this.adjacency.get(b)?.delete(a);
    }
    return removed;
  }

  /** Snapshot of the edges; later mutations do not affect the returned array. */
  listEdges(): EdgeRecord[] {
    return Array.from(this.edges.values());
  }

  neighbours(id: string): string[] {
    return Array.from(this.adjacency.get(id) ?? []);
  }

  countEdgesByColor(): Record<EdgeColor, number> {
    const counts: Record<EdgeColor, number> = { red: 0, blue: 0 };
    for (const edge of this.edges.values()) {
      counts[edge.color] += 1;
    }
    return counts;
  }

  /** Vertex identifiers grouped by their `language` attribute, in insertion order. */
  verticesByLanguage(): Map<string, string[]> {
    const grouped = new Map<string, string[]>();
    for (const vertex of this.vertices.values()) {
      const bucket = grouped.get(vertex.attributes.language);
      if (bucket) {
        bucket.push(vertex.id);
      } else {
        grouped.set(vertex.attributes.language, [vertex.id]);
      }
    }
    return grouped;
  }

  /** Deep copy preserving insertion order of vertices and edges. */
  clone(): SampleGraph {
    const copy = new SampleGraph();
    for (const vertex of this.vertices.values()) {
      copy.addVertex(vertex.id, vertex.attributes);
    }
    for (const edge of this.edges.values()) {
      copy.addEdge(edge.source, edge.target, edge.color);
    }
    return copy;
  }
}
