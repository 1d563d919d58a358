/**
 * Query result types
 */

/**
 * Decoded cell value
 */
export type Cell =
  | { kind: 'number'; value: number }
  | { kind: 'null' }
  | { kind: 'other'; raw: unknown };

export interface QueryColumn {
  name: string;
  type: string;
}

export interface QueryResultTable {
  name: string;
  columns: QueryColumn[];
  rows: Cell[][];
}

export interface QueryResult {
  tables: QueryResultTable[];
}

/**
 * Metric value and threshold extracted from a query result
 * threshold = -1 means the query carried no threshold column
 */
export interface MetricSample {
  value: number;
  threshold: number;
}

/**
 * Raw outcome of one query request
 * status 0 means no response was received
 */
export interface QueryHttpResult {
  body: string;
  status: number;
  transportError?: Error;
}

/**
 * Query executor configuration
 */
export interface QueryExecutorConfig {
  workspaceId: string;
  baseUrl: string;
  timeout: number;
  userAgent: string;
}
