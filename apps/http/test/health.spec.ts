import { describe, it, expect } from 'vitest';
import { buildApp } from '../src/app';
import { fakeSource, testConfig } from '../../../tests/helpers';

describe('health and readiness', () => {
  it('reports liveness without touching the sources', async () => {
    const app = await buildApp({
      config: testConfig(),
      sources: { mysql: fakeSource('mysql'), mongo: fakeSource('mongodb') }
    });
    const res = await app.inject({ method: 'GET', url: '/healthz' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
    expect(res.headers['x-request-id']).toMatch(/^req-[a-z0-9]+$/);
    await app.close();
  });

  it('is ready when both sources are', async () => {
    const app = await buildApp({
      config: testConfig(),
      sources: { mysql: fakeSource('mysql'), mongo: fakeSource('mongodb') }
    });
    const res = await app.inject({ method: 'GET', url: '/readyz' });
    expect(res.json()).toEqual({ ok: true, mysql: { ok: true }, mongo: { ok: true } });
    await app.close();
  });

  it('reports each source separately when one is down or its check throws', async () => {
    const app = await buildApp({
      config: testConfig(),
      sources: {
        mysql: fakeSource('mysql', {
          health: async () => {
            throw new Error('pool closed');
          }
        }),
        mongo: fakeSource('mongodb', { health: async () => ({ ok: false, details: 'source not connected' }) })
      }
    });
    const res = await app.inject({ method: 'GET', url: '/readyz' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ok: false,
      mysql: { ok: false },
      mongo: { ok: false, details: 'source not connected' }
    });
    await app.close();
  });
});

describe('CORS and rate limiting', () => {
  it('echoes an allowed origin', async () => {
    const app = await buildApp({
      config: testConfig({ corsOrigins: ['http://app.test'] }),
      sources: { mysql: fakeSource('mysql'), mongo: fakeSource('mongodb') }
    });
    const res = await app.inject({ method: 'GET', url: '/healthz', headers: { origin: 'http://app.test' } });
    expect(res.headers['access-control-allow-origin']).toBe('http://app.test');
    await app.close();
  });

  it('limits requests per minute', async () => {
    const app = await buildApp({
      config: testConfig({ rateLimitMax: 2 }),
      sources: { mysql: fakeSource('mysql'), mongo: fakeSource('mongodb') }
    });
    const statuses: number[] = [];
    for (let i = 0; i < 3; i++) {
      statuses.push((await app.inject({ method: 'GET', url: '/healthz' })).statusCode);
    }
    expect(statuses).toEqual([200, 200, 429]);
    await app.close();
  });
});
