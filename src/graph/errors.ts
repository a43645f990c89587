/** Error code raised when a mutation would break the graph's structural rules. */
export const ERROR_GRAPH_INVARIANT = "E-KG-GRAPH-INVARIANT" as const;

export type GraphInvariantRule = "self_loop" | "unknown_vertex" | "unknown_edge";

/** Error thrown when a mutation would make the sample graph non-simple or dangling. */
export class GraphInvariantError extends Error {
  public readonly code = ERROR_GRAPH_INVARIANT;
  public readonly rule: GraphInvariantRule;
  public readonly details: Readonly<Record<string, string>>;

  constructor(rule: GraphInvariantRule, message: string, details: Readonly<Record<string, string>> = {}) {
    super(message);
    this.name = "GraphInvariantError";
    this.rule = rule;
    this.details = details;
  }
}
