// packages/estimator/src/contract.ts
import type { CellValue, CountKeys, Table } from '@logodds/core';
import {
  DegenerateTableError,
  DuplicateRowError,
  EmptyInputError,
  InvalidCountError
} from '@logodds/core';
import { keyOf, numberAt } from '@logodds/table';

/**
 * Checks that `tbl` is a count table: at least one row, finite non-negative counts,
 * exactly one row per (set, feature), and no set reduced to a single feature.
 * Under the empirical prior every feature also needs a positive total, since its
 * total becomes its pseudo-count.
 */
export function validateCountTable(
  tbl: Table,
  keys: CountKeys,
  opts: { uninformative?: boolean } = {}
): void {
  if (tbl.rows.length === 0) throw new EmptyInputError();

  tbl.rows.forEach((r, i) => {
    const v = r[keys.n];
    if (typeof v !== 'number' || !Number.isFinite(v) || v < 0) {
      throw InvalidCountError.atRow(keys.n, i, v);
    }
  });

  const pairs = new Map<string, Set<string>>();
  const setSizes = new Map<string, { set: CellValue; features: number }>();
  const featureTotals = new Map<string, { feature: CellValue; total: number }>();

  tbl.rows.forEach((r, i) => {
    const set = r[keys.set] ?? null;
    const feature = r[keys.feature] ?? null;
    const sk = keyOf(set);
    const fk = keyOf(feature);

    const seen = pairs.get(sk) ?? new Set<string>();
    if (seen.has(fk)) throw new DuplicateRowError(set, feature, i);
    seen.add(fk);
    pairs.set(sk, seen);

    const size = setSizes.get(sk) ?? { set, features: 0 };
    size.features += 1;
    setSizes.set(sk, size);

    const total = featureTotals.get(fk) ?? { feature, total: 0 };
    total.total += numberAt(r, keys.n);
    featureTotals.set(fk, total);
  });

  if (!opts.uninformative) {
    for (const { feature, total } of featureTotals.values()) {
      if (total <= 0) throw InvalidCountError.zeroFeature(keys.n, feature);
    }
  }

  for (const { set, features } of setSizes.values()) {
    if (features < 2) throw new DegenerateTableError(set);
  }
}
