// packages/core/src/trace.ts
// EstimateTrace: what a computation did, for debugging and /log-odds?debug=1

import type { CellValue, CountKeys, Estimate, PriorMode, PseudoCounts } from './types';

export interface RowTrace extends PseudoCounts, Estimate {
  set: CellValue;
  feature: CellValue;
  n: number;
  alpha: number;
}

export interface EstimateTrace {
  keys: CountKeys;
  prior: PriorMode;
  rowCount: number;
  sets: number;
  features: number;
  totalMass: number;      // Y = Σ y_wi
  groups: string[];       // grouping metadata seen on the input (ignored by the computation)
  rows?: RowTrace[];      // per-row intermediates; omitted in summaries
}

export function summarizeTrace(trace: EstimateTrace): EstimateTrace {
  const { rows: _rows, ...summary } = trace;
  return summary;
}
