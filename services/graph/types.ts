/**
 * A single row returned by a graph query, keyed by the RETURN aliases.
 */
export type GraphRecord = Record<string, unknown>;

/**
 * Graph database the QA chain reads from.
 *
 * `getSchema` is a plain accessor; implementations may reflect live state
 * so callers should not cache it across questions.
 */
export interface GraphStore<TResult = unknown> {
  getSchema(): string;
  query(statement: string): Promise<TResult>;
}

/**
 * Schema rows as produced by the graph's schema procedures.
 */
export interface NodePropertyRow {
  labels: string[];
  property: string | null;
  types: string[];
}

export interface RelationshipPropertyRow {
  type: string;
  property: string | null;
  types: string[];
}

export interface RelationshipPatternRow {
  start: string;
  type: string;
  end: string;
}
