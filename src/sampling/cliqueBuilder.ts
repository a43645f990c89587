import { DisjointSet } from "../graph/unionFind.js";
import type { VertexPair } from "../graph/types.js";
import type { TranslationTable } from "./translationResolver.js";

/**
 * Closes the translation relation into equivalence classes and emits every
 * class of two or more known identifiers as a clique of blue edges.
 *
 * The classes are computed once with a disjoint-set pass, so the emitted list
 * is never grown while it is being read. Pairs touching an identifier outside
 * {@link knownVertexIds} are ignored, as are self pairs. Output order is
 * deterministic: classes by first-seen member, then pairs `(i, j)` with
 * `i < j` in member order.
 */
export function buildCliqueEdges(
  translationTables: Iterable<TranslationTable>,
  knownVertexIds: ReadonlySet<string>,
): VertexPair[] {
  const classes = new DisjointSet();
  for (const table of translationTables) {
    for (const [id, record] of table) {
      if (!knownVertexIds.has(id)) {
        continue;
      }
      for (const equivalent of record.values()) {
        if (equivalent === id || !knownVertexIds.has(equivalent)) {
          continue;
        }
        classes.union(id, equivalent);
      }
    }
  }

  const edges: VertexPair[] = [];
  for (const members of classes.components()) {
    if (members.length < 2) {
      continue;
    }
    for (let i = 0; i < members.length; i += 1) {
      for (let j = i + 1; j < members.length; j += 1) {
        edges.push([members[i], members[j]]);
      }
    }
  }
  return edges;
}
