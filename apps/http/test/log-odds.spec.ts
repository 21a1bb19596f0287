import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/app';
import { fakeSource, testConfig } from '../../../tests/helpers';

const rows = [
  { doc: 1, word: 'the', n: 1 },
  { doc: 1, word: 'quick', n: 1 },
  { doc: 1, word: 'brown', n: 1 },
  { doc: 1, word: 'fox', n: 1 },
  { doc: 1, word: 'jumped', n: 2 },
  { doc: 2, word: 'over', n: 1 },
  { doc: 2, word: 'the', n: 1 },
  { doc: 2, word: 'lazy', n: 1 },
  { doc: 2, word: 'brown', n: 1 },
  { doc: 2, word: 'dog', n: 2 }
];

describe('POST /log-odds', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await buildApp({
      config: testConfig(),
      sources: { mysql: fakeSource('mysql'), mongo: fakeSource('mongodb') }
    });
  });

  afterAll(async () => {
    await app.close();
  });

  it('binds log_odds_weighted to every row', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/log-odds',
      payload: { rows, set: 'doc', feature: 'word', n: 'n' }
    });
    expect(res.statusCode).toBe(200);

    const body = res.json();
    expect(body.columns).toEqual(['doc', 'word', 'n', 'log_odds_weighted']);
    expect(body.groups).toEqual([]);
    expect(body.meta.rowCount).toBe(10);
    expect(body.rows[0]).toEqual({ doc: 1, word: 'the', n: 1, log_odds_weighted: 0 });
    expect(body.rows[1].log_odds_weighted).toBeCloseTo(Math.log(26 / 12), 10);
    expect(body.trace).toBeUndefined();
  });

  it('adds the unweighted column and honours the uninformative prior', async () => {
    const unweighted = await app.inject({
      method: 'POST',
      url: '/log-odds',
      payload: { rows, set: 'doc', feature: 'word', n: 'n', unweighted: true }
    });
    const u = unweighted.json();
    expect(u.columns).toEqual(['doc', 'word', 'n', 'log_odds', 'log_odds_weighted']);
    expect(u.rows[4].log_odds).toBeCloseTo(Math.log(2.4), 10);
    expect(u.rows[4].log_odds_weighted).toBeCloseTo(Math.log(2.4) / Math.sqrt(0.5), 10);

    const flat = await app.inject({
      method: 'POST',
      url: '/log-odds',
      payload: { rows, set: 'doc', feature: 'word', n: 'n', uninformative: true }
    });
    expect(flat.json().rows[1].log_odds_weighted).toBeCloseTo(Math.log(20 / 9), 10);
  });

  it('accepts column positions and keeps grouping metadata', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/log-odds',
      payload: { rows, groups: ['doc'], set: 0, feature: 1, n: 2 }
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.groups).toEqual(['doc']);
    expect(body.rows[1].log_odds_weighted).toBeCloseTo(Math.log(26 / 12), 10);
  });

  it('answers with only the declared columns when columns are given', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/log-odds',
      payload: {
        rows: rows.map(r => ({ ...r, note: 'scratch' })),
        columns: ['doc', 'word', 'n'],
        set: 'doc',
        feature: 'word',
        n: 'n'
      }
    });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.columns).toEqual(['doc', 'word', 'n', 'log_odds_weighted']);
    expect(Object.keys(body.rows[0])).toEqual(['doc', 'word', 'n', 'log_odds_weighted']);
  });

  it('returns a trace summary in debug mode', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/log-odds?debug=1',
      payload: { rows, set: 'doc', feature: 'word', n: 'n' }
    });
    const { trace } = res.json();
    expect(trace).toEqual({
      keys: { set: 'doc', feature: 'word', n: 'n' },
      prior: 'empirical-bayes',
      rowCount: 10,
      sets: 2,
      features: 8,
      totalMass: 28,
      groups: []
    });
  });

  it('rejects a malformed body with 400 VALIDATION', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/log-odds',
      payload: { rows: 'nope', set: 'doc', feature: 'word', n: 'n' }
    });
    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.code).toBe('VALIDATION');
    expect(body.details[0].path).toBe('rows');
  });

  it('rejects unknown request fields', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/log-odds',
      payload: { rows, set: 'doc', feature: 'word', n: 'n', smoothing: 0.5 }
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().details[0].code).toBe('unrecognized_keys');
  });
});
