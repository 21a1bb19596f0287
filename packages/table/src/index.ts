// packages/table/src/index.ts
// In-memory tables: grouping metadata, group-by-sum, one-key equi-join, per-row columns.
import type { CellValue, ColumnRef, Row, Table } from '@logodds/core';
import { ColumnNotFoundError } from '@logodds/core';

export type { CellValue, ColumnRef, Row, Table };

// ----------------------
// Keys
// ----------------------
/**
 * Canonical map key for a cell. Type-tagged so that 1 and "1" stay distinct.
 */
export function keyOf(v: CellValue): string {
  if (v === null) return 'null';
  switch (typeof v) {
    case 'string':  return `s:${v}`;
    case 'number':  return `n:${Object.is(v, -0) ? 0 : v}`;
    default:        return `b:${v}`;
  }
}

// ----------------------
// Construction & grouping
// ----------------------
/**
 * Builds a table from plain rows. Without `columns` the columns are the row keys
 * in first-seen order; with `columns` every row is projected onto exactly those.
 */
export function tableFrom(
  rows: Row[],
  opts: { columns?: string[]; groups?: string[] } = {}
): Table {
  const explicit = opts.columns;
  let tbl: Table;
  if (explicit) {
    const projected = rows.map(r => {
      const out: Row = {};
      for (const c of explicit) out[c] = r[c] ?? null;
      return out;
    });
    tbl = { columns: [...explicit], rows: projected, groups: [] };
  } else {
    const seen = new Set<string>();
    const columns: string[] = [];
    for (const r of rows) {
      for (const k of Object.keys(r)) {
        if (!seen.has(k)) { seen.add(k); columns.push(k); }
      }
    }
    tbl = { columns, rows: [...rows], groups: [] };
  }
  return opts.groups?.length ? groupBy(tbl, ...opts.groups) : tbl;
}

export function groupBy<R extends Row>(tbl: Table<R>, ...cols: string[]): Table<R> {
  for (const c of cols) {
    if (!tbl.columns.includes(c)) throw new ColumnNotFoundError(c, tbl.columns);
  }
  return { ...tbl, groups: [...new Set(cols)] };
}

export function ungroup<R extends Row>(tbl: Table<R>): Table<R> {
  return tbl.groups.length ? { ...tbl, groups: [] } : tbl;
}

export function groupVars(tbl: Table): string[] {
  return [...tbl.groups];
}

// ----------------------
// Column binding
// ----------------------
export function resolveColumn(tbl: Table, ref: ColumnRef): string {
  if (typeof ref === 'number') {
    const name = Number.isInteger(ref) ? tbl.columns[ref] : undefined;
    if (name === undefined) throw new ColumnNotFoundError(ref, tbl.columns);
    return name;
  }
  if (!tbl.columns.includes(ref)) throw new ColumnNotFoundError(ref, tbl.columns);
  return ref;
}

/**
 * Coerces a driver value into a cell: bigints become numbers, dates ISO strings,
 * undefined null, and anything else non-primitive its string form.
 */
export function cellFrom(v: unknown): CellValue {
  if (v === undefined || v === null) return null;
  if (typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean') return v;
  if (typeof v === 'bigint') return Number(v);
  if (v instanceof Date) return v.toISOString();
  return String(v);
}

/** Numeric value of a cell, NaN for anything that is not a number. */
export function numberAt(row: Row, col: string): number {
  const v = row[col];
  return typeof v === 'number' ? v : Number.NaN;
}

export function pull(tbl: Table, col: string): CellValue[] {
  const name = resolveColumn(tbl, col);
  return tbl.rows.map(r => r[name] ?? null);
}

export function select(tbl: Table, ...cols: string[]): Table {
  const names = cols.map(c => resolveColumn(tbl, c));
  const rows = tbl.rows.map(r => {
    const out: Row = {};
    for (const n of names) out[n] = r[n] ?? null;
    return out;
  });
  return { columns: names, rows, groups: tbl.groups.filter(g => names.includes(g)) };
}

// ----------------------
// Column arithmetic
// ----------------------
/** Add (or replace, keeping its position) one column computed per row. */
export function mutate<R extends Row>(
  tbl: Table<R>,
  name: string,
  fn: (row: R, i: number) => CellValue
): Table<Row> {
  const columns = tbl.columns.includes(name) ? [...tbl.columns] : [...tbl.columns, name];
  const rows: Row[] = tbl.rows.map((r, i) => ({ ...r, [name]: fn(r, i) }));
  return { columns, rows, groups: [...tbl.groups] };
}

// ----------------------
// Group-by-sum
// ----------------------
/**
 * One row per distinct value of `key` (first-seen order) holding the sum of `wt`,
 * or the number of rows when no weight column is given. Non-numeric weights count 0.
 */
export function countBy(
  tbl: Table,
  key: string,
  opts: { wt?: string; name?: string } = {}
): Table {
  const col = resolveColumn(tbl, key);
  const wt = opts.wt !== undefined ? resolveColumn(tbl, opts.wt) : undefined;
  const name = opts.name ?? 'n';

  const order: CellValue[] = [];
  const sums = new Map<string, number>();
  for (const r of tbl.rows) {
    const v = r[col] ?? null;
    const k = keyOf(v);
    if (!sums.has(k)) { sums.set(k, 0); order.push(v); }
    const w = wt === undefined ? 1 : r[wt];
    sums.set(k, (sums.get(k) ?? 0) + (typeof w === 'number' ? w : 0));
  }

  const rows = order.map(v => ({ [col]: v, [name]: sums.get(keyOf(v)) ?? 0 }));
  return { columns: [col, name], rows, groups: [] };
}

// ----------------------
// Equi-join (1 key)
// ----------------------
/**
 * Left join on one key column. Right keys must be unique; unmatched left rows get null
 * for every right-hand column. Left column order is kept, new right columns are appended.
 */
export function leftJoin(left: Table, right: Table, by: string): Table {
  const lk = resolveColumn(left, by);
  const rk = resolveColumn(right, by);

  const index = new Map<string, Row>();
  for (const r of right.rows) {
    const k = keyOf(r[rk] ?? null);
    if (index.has(k)) throw new Error(`leftJoin: duplicate right-hand key ${k} in "${rk}"`);
    index.set(k, r);
  }

  const extra = right.columns.filter(c => c !== rk && !left.columns.includes(c));
  const rows = left.rows.map(l => {
    const match = index.get(keyOf(l[lk] ?? null));
    const out: Row = { ...l };
    for (const c of extra) out[c] = match ? (match[c] ?? null) : null;
    return out;
  });

  return { columns: [...left.columns, ...extra], rows, groups: [...left.groups] };
}
