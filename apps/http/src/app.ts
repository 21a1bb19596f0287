// apps/http/src/app.ts
import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { ZodError } from 'zod';
import {
  ErrorCodes,
  LogOddsRequestSchema,
  SourceRequestSchema,
  isLogOddsError,
  summarizeTrace,
  type ColumnRef,
  type CountSource,
  type LogOddsOptions,
  type Table
} from '@logodds/core';
import { bindAndExplainLogOdds, bindLogOdds } from '@logodds/estimator';
import { tableFrom } from '@logodds/table';
import type { AppConfig } from './config';

export interface Sources {
  mysql: CountSource;
  mongo: CountSource;
}

function shouldDebug(req: FastifyRequest, config: AppConfig) {
  const query = req.query;
  const q = typeof query === 'object' && query !== null && 'debug' in query ? String(query.debug) : '';
  const h = String(req.headers['x-debug'] ?? '');
  return q === '1' || h === '1' || config.debugErrors;
}

function validationBody(e: ZodError) {
  const details = e.issues.map(i => ({ path: i.path.join('.'), msg: i.message, code: i.code }));
  return { code: 'VALIDATION', details };
}

export function classifyError(e: unknown): { code: string; status: number; message: string; details?: unknown } {
  const message = e instanceof Error ? e.message : String(e);

  if (e instanceof ZodError) return { code: 'VALIDATION', status: 400, message, details: validationBody(e).details };

  if (isLogOddsError(e)) {
    const status =
      e.code === ErrorCodes.COLUMN_NOT_FOUND ? 400 :
      e.code === ErrorCodes.SOURCE ? 502 : 422;
    return { code: e.code, status, message, details: e.details };
  }

  // fastify/plugin errors (bad JSON, body too large, rate limit) carry their own status
  const statusCode = typeof e === 'object' && e !== null && 'statusCode' in e ? e.statusCode : undefined;
  if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
    return { code: 'REQUEST', status: statusCode, message };
  }

  return { code: 'INTERNAL', status: 500, message };
}

export async function buildApp(deps: { config: AppConfig; sources: Sources }): Promise<FastifyInstance> {
  const { config, sources } = deps;

  const app = Fastify({
    logger: { level: config.logLevel },
    bodyLimit: config.bodyLimit
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = config.corsOrigins;
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: '1 minute'
  });

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  app.setErrorHandler((err, req, reply) => {
    const { code, status, message, details } = classifyError(err);
    if (status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    else req.log.warn({ code, requestId: req.id, error: message }, 'request-rejected');

    reply.status(status).send({
      code,
      message: 'Request failed',
      error: message,
      requestId: req.id,
      ...(details !== undefined ? { details } : {}),
      ...(shouldDebug(req, config) ? { trace: { errorCode: code } } : {})
    });
  });

  app.log.info(
    {
      cors: config.corsOrigins.length ? config.corsOrigins : 'any',
      rateLimitMax: config.rateLimitMax,
      mysql: sources.mysql.name,
      mongo: sources.mongo.name
    },
    'app-config'
  );

  // one pass either way; the debug pass also keeps the trace
  function compute(tbl: Table, set: ColumnRef, feature: ColumnRef, n: ColumnRef, opts: LogOddsOptions, debug: boolean) {
    const t0 = Date.now();
    const out = debug
      ? bindAndExplainLogOdds(tbl, set, feature, n, opts)
      : { result: bindLogOdds(tbl, set, feature, n, opts), trace: undefined };
    return { result: out.result, trace: out.trace && summarizeTrace(out.trace), computeMs: Date.now() - t0 };
  }

  // ------------------------------------
  // POST /log-odds  (inline count table)
  // ------------------------------------
  app.post('/log-odds', async (req, reply) => {
    const parsed = LogOddsRequestSchema.safeParse(req.body);
    if (!parsed.success) return reply.status(400).send(validationBody(parsed.error));

    const body = parsed.data;
    const opts: LogOddsOptions = { uninformative: body.uninformative, unweighted: body.unweighted };
    const tbl = tableFrom(body.rows, { columns: body.columns, groups: body.groups });

    const { result, trace, computeMs } = compute(tbl, body.set, body.feature, body.n, opts, shouldDebug(req, config));

    return reply.send({
      columns: result.columns,
      groups: result.groups,
      rows: result.rows,
      meta: { rowCount: result.rows.length, computeMs },
      ...(trace ? { trace } : {})
    });
  });

  // ------------------------------------
  // POST /log-odds/source  (count table read from MySQL / MongoDB)
  // ------------------------------------
  app.post('/log-odds/source', async (req, reply) => {
    const parsed = SourceRequestSchema.safeParse(req.body);
    if (!parsed.success) return reply.status(400).send(validationBody(parsed.error));

    const { target, uninformative, unweighted, ...query } = parsed.data;
    const source = target === 'mysql' ? sources.mysql : sources.mongo;
    reply.header('x-source', source.name);

    const t0 = Date.now();
    const { table, meta } = await source.readCounts(query);
    const sourceMs = Date.now() - t0;

    // sources always emit [set, feature, n]
    const opts: LogOddsOptions = { uninformative, unweighted };
    const { result, trace, computeMs } = compute(table, 0, 1, 2, opts, shouldDebug(req, config));

    return reply.send({
      columns: result.columns,
      groups: result.groups,
      rows: result.rows,
      meta: { ...meta, source: source.name, rowCount: result.rows.length, sourceMs, computeMs },
      ...(trace ? { trace } : {})
    });
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async () => {
    const [mh, gh] = await Promise.allSettled([sources.mysql.health(), sources.mongo.health()]);
    const mysql = mh.status === 'fulfilled' ? mh.value : { ok: false };
    const mongo = gh.status === 'fulfilled' ? gh.value : { ok: false };
    return { ok: mysql.ok && mongo.ok, mysql, mongo };
  });

  return app;
}
