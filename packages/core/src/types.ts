// --------------------
// Cells, rows & tables
// --------------------
export type CellValue = string | number | boolean | null;

export type Row = Record<string, CellValue>;

// Grouping is metadata only: names of grouping columns, carried alongside the rows.
export interface Table<R extends Row = Row> {
  columns: string[];
  rows: R[];
  groups: string[];
}

// Column name, or zero-based index into `columns`
export type ColumnRef = string | number;

// Resolved column names for one computation
export interface CountKeys {
  set: string;
  feature: string;
  n: string;
}

// --------------------
// Estimation entities
// --------------------
export type PriorMode = 'empirical-bayes' | 'uninformative';

// feature key (see keyOf) -> alpha
export type PriorVector = Map<string, number>;

export interface PseudoCounts {
  yWi: number; // n + alpha(feature)
  yW: number;  // Σ y_wi over the feature's rows
  nI: number;  // Σ y_wi over the set's rows
}

export interface Estimate {
  omegaWi: number;
  omegaW: number;
  deltaWi: number;  // log_odds
  sigma2Wi: number;
  zetaWi: number;   // log_odds_weighted
}

export interface LogOddsOptions {
  uninformative?: boolean;
  unweighted?: boolean;
}

// --------------------
// Count sources
// --------------------
export interface CountQuery {
  source: string;   // table or collection
  set: string;
  feature: string;
  n?: string;       // summed when given, otherwise each record counts 1
  limit?: number;
}

export interface CountSource {
  name: 'mysql' | 'mongodb';
  readCounts(q: CountQuery): Promise<{ table: Table; meta: Record<string, unknown> }>;
  health(): Promise<{ ok: boolean; details?: unknown }>;
  close(): Promise<void>;
}
