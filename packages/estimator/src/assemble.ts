// packages/estimator/src/assemble.ts
import type { Estimate, Table } from '@logodds/core';
import { groupBy, mutate } from '@logodds/table';
import { LOG_ODDS, LOG_ODDS_WEIGHTED } from './columns';

/**
 * Original rows, in order, with their columns untouched, plus `log_odds` (when asked)
 * and `log_odds_weighted`. `groups` is reattached as-is.
 */
export function assembleResult(
  original: Table,
  estimates: Estimate[],
  opts: { unweighted?: boolean; groups?: string[] } = {}
): Table {
  if (estimates.length !== original.rows.length) {
    throw new Error(`assembleResult: ${estimates.length} estimates for ${original.rows.length} rows`);
  }

  let out: Table = { ...original, groups: [] };
  if (opts.unweighted) out = mutate(out, LOG_ODDS, (_r, i) => estimates[i].deltaWi);
  out = mutate(out, LOG_ODDS_WEIGHTED, (_r, i) => estimates[i].zetaWi);

  const groups = opts.groups ?? [];
  return groups.length ? groupBy(out, ...groups) : out;
}
