// packages/estimator/src/prior.ts
import type { PriorMode, PriorVector, Table } from '@logodds/core';
import { countBy, keyOf, numberAt } from '@logodds/table';

export function priorMode(opts: { uninformative?: boolean } = {}): PriorMode {
  return opts.uninformative ? 'uninformative' : 'empirical-bayes';
}

/**
 * Pseudo-count per feature.
 *  - uninformative: alpha = 1 for every feature (add-one smoothing per feature per set)
 *  - empirical Bayes (default): alpha = the feature's total count over all sets,
 *    a moment-style stand-in for the Dirichlet concentration
 */
export function estimatePrior(
  tbl: Table,
  feature: string,
  n: string,
  opts: { uninformative?: boolean } = {}
): PriorVector {
  const prior: PriorVector = new Map();

  if (opts.uninformative) {
    for (const r of tbl.rows) prior.set(keyOf(r[feature] ?? null), 1);
    return prior;
  }

  const totals = countBy(tbl, feature, { wt: n, name: 'alpha' });
  for (const r of totals.rows) {
    prior.set(keyOf(r[feature] ?? null), numberAt(r, 'alpha'));
  }
  return prior;
}
