// packages/estimator/src/pseudo.ts
import type { PriorVector, PseudoCounts, Row, Table } from '@logodds/core';
import { countBy, keyOf, leftJoin, mutate, numberAt } from '@logodds/table';
import { ALPHA, FEATURE, N, N_I, SET, Y_W, Y_WI } from './columns';

/**
 * Annotates every working row with alpha, y_wi = n + alpha, its feature's y_w and its
 * set's n_i. Aggregates are summed once per distinct feature / set, then joined back.
 */
export function aggregatePseudoCounts(work: Table, prior: PriorVector): Table {
  const withAlpha = mutate(work, ALPHA, r => prior.get(keyOf(r[FEATURE] ?? null)) ?? Number.NaN);
  const withY = mutate(withAlpha, Y_WI, r => numberAt(r, N) + numberAt(r, ALPHA));

  const byFeature = countBy(withY, FEATURE, { wt: Y_WI, name: Y_W });
  const bySet = countBy(withY, SET, { wt: Y_WI, name: N_I });

  return leftJoin(leftJoin(withY, byFeature, FEATURE), bySet, SET);
}

export function pseudoCountsOf(r: Row): PseudoCounts {
  return { yWi: numberAt(r, Y_WI), yW: numberAt(r, Y_W), nI: numberAt(r, N_I) };
}
