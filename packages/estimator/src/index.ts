// packages/estimator/src/index.ts
// Weighted log-odds: validate -> prior -> pseudo-counts -> odds/variance -> assemble.

import type {
  ColumnRef,
  CountKeys,
  Estimate,
  EstimateTrace,
  LogOddsOptions,
  PriorVector,
  PseudoCounts,
  Row,
  Table
} from '@logodds/core';
import { EmptyInputError } from '@logodds/core';
import { groupVars, keyOf, numberAt, resolveColumn, ungroup } from '@logodds/table';
import { ALPHA, FEATURE, N, SET } from './columns';
import { validateCountTable } from './contract';
import { estimatePrior, priorMode } from './prior';
import { aggregatePseudoCounts, pseudoCountsOf } from './pseudo';
import { computeEstimates, totalMass } from './odds';
import { assembleResult } from './assemble';

export { validateCountTable } from './contract';
export { estimatePrior, priorMode } from './prior';
export { aggregatePseudoCounts, pseudoCountsOf } from './pseudo';
export { computeEstimates, estimate, totalMass } from './odds';
export { assembleResult } from './assemble';
export { LOG_ODDS, LOG_ODDS_WEIGHTED } from './columns';

interface Run {
  keys: CountKeys;
  groups: string[];
  work: Table;
  prior: PriorVector;
  pseudoTable: Table;
  pseudo: PseudoCounts[];
  estimates: Estimate[];
  result: Table;
}

function resolveKeys(tbl: Table, set: ColumnRef, feature: ColumnRef, n: ColumnRef): CountKeys {
  return {
    set: resolveColumn(tbl, set),
    feature: resolveColumn(tbl, feature),
    n: resolveColumn(tbl, n)
  };
}

// Only the three bound columns, under fixed names
function workingTable(tbl: Table, keys: CountKeys): Table {
  const rows: Row[] = tbl.rows.map(r => ({
    [SET]: r[keys.set] ?? null,
    [FEATURE]: r[keys.feature] ?? null,
    [N]: r[keys.n] ?? null
  }));
  return { columns: [SET, FEATURE, N], rows, groups: [] };
}

function run(
  tbl: Table,
  set: ColumnRef,
  feature: ColumnRef,
  n: ColumnRef,
  opts: LogOddsOptions
): Run {
  // groups are preserved but ignored
  const groups = groupVars(tbl);
  const base = ungroup(tbl);
  if (base.rows.length === 0) throw new EmptyInputError();

  const keys = resolveKeys(base, set, feature, n);
  validateCountTable(base, keys, opts);

  const work = workingTable(base, keys);
  const prior = estimatePrior(work, FEATURE, N, opts);
  const pseudoTable = aggregatePseudoCounts(work, prior);
  const pseudo = pseudoTable.rows.map(pseudoCountsOf);
  const estimates = computeEstimates(pseudo);
  const result = assembleResult(base, estimates, { unweighted: opts.unweighted, groups });

  return { keys, groups, work, prior, pseudoTable, pseudo, estimates, result };
}

/**
 * Binds the weighted log-odds of each (set, feature) count to the table.
 *
 * `tbl` must hold exactly one row per set/feature combination. The result keeps every
 * row and column of `tbl`, in order, and adds `log_odds_weighted` (a z-score of the
 * log-odds ratio of the feature in its set against the whole table), preceded by the
 * unweighted `log_odds` when `unweighted` is set. The prior is estimated from the data
 * unless `uninformative` is set, in which case every feature gets a pseudo-count of 1.
 * Grouping on `tbl` is kept on the result and has no effect on the values.
 *
 * @throws EmptyInputError, InvalidCountError, DuplicateRowError, DegenerateTableError,
 *   ColumnNotFoundError
 */
export function bindLogOdds(
  tbl: Table,
  set: ColumnRef,
  feature: ColumnRef,
  n: ColumnRef,
  opts: LogOddsOptions = {}
): Table {
  return run(tbl, set, feature, n, opts).result;
}

export const computeWeightedLogOdds = bindLogOdds;

function traceOf(r: Run, opts: LogOddsOptions): EstimateTrace {
  const sets = new Set(r.work.rows.map(w => keyOf(w[SET] ?? null)));

  return {
    keys: r.keys,
    prior: priorMode(opts),
    rowCount: r.work.rows.length,
    sets: sets.size,
    features: r.prior.size,
    totalMass: totalMass(r.pseudo),
    groups: r.groups,
    rows: r.pseudoTable.rows.map((w, i) => ({
      set: w[SET] ?? null,
      feature: w[FEATURE] ?? null,
      n: numberAt(w, N),
      alpha: numberAt(w, ALPHA),
      ...r.pseudo[i],
      ...r.estimates[i]
    }))
  };
}

/** Runs the pipeline once, returning both the bound table and its trace. */
export function bindAndExplainLogOdds(
  tbl: Table,
  set: ColumnRef,
  feature: ColumnRef,
  n: ColumnRef,
  opts: LogOddsOptions = {}
): { result: Table; trace: EstimateTrace } {
  const r = run(tbl, set, feature, n, opts);
  return { result: r.result, trace: traceOf(r, opts) };
}

/** Same pipeline as bindLogOdds, returning its intermediates instead of the table. */
export function explainLogOdds(
  tbl: Table,
  set: ColumnRef,
  feature: ColumnRef,
  n: ColumnRef,
  opts: LogOddsOptions = {}
): EstimateTrace {
  return traceOf(run(tbl, set, feature, n, opts), opts);
}
