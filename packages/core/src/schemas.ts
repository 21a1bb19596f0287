// packages/core/src/schemas.ts
import { z } from 'zod';

export const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const RowSchema = z.record(z.string(), CellValueSchema);

export const ColumnRefSchema = z.union([z.string().min(1), z.number().int().min(0)]);

export const LogOddsOptionsSchema = z.object({
  uninformative: z.boolean().optional(),
  unweighted: z.boolean().optional()
}).strict();

// Inline count table
export const LogOddsRequestSchema = z.object({
  rows: z.array(RowSchema),
  columns: z.array(z.string()).optional(),
  groups: z.array(z.string()).optional(),
  set: ColumnRefSchema,
  feature: ColumnRefSchema,
  n: ColumnRefSchema,
  uninformative: z.boolean().optional(),
  unweighted: z.boolean().optional()
}).strict();
export type LogOddsRequest = z.infer<typeof LogOddsRequestSchema>;

// Identifiers end up quoted, but keep them to plain names (optionally schema-qualified)
const Identifier = z.string().regex(/^[a-zA-Z_][a-zA-Z0-9_]*(\.[a-zA-Z_][a-zA-Z0-9_]*)?$/, 'invalid identifier');

export const MAX_SOURCE_ROWS = 1_000_000;
export const DEFAULT_SOURCE_ROWS = 100_000;

// "corpus.doc_id" -> "doc_id": the column name a source gives a grouped field
export const outputName = (path: string): string => path.slice(path.lastIndexOf('.') + 1);

export function countOutputNames(q: { set: string; feature: string; n?: string }) {
  return { set: outputName(q.set), feature: outputName(q.feature), n: q.n ? outputName(q.n) : 'n' };
}

type CountField = 'set' | 'feature' | 'n';

/** First pair of fields that would land in the same output column, if any. */
export function outputCollision(q: { set: string; feature: string; n?: string }): [CountField, CountField] | undefined {
  const names = countOutputNames(q);
  if (names.set === names.feature) return ['set', 'feature'];
  if (names.set === names.n) return ['set', 'n'];
  if (names.feature === names.n) return ['feature', 'n'];
  return undefined;
}

const distinctOutputs = (q: { set: string; feature: string; n?: string }, ctx: z.RefinementCtx) => {
  const clash = outputCollision(q);
  if (!clash) return;
  const [a, b] = clash;
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    path: [b],
    message: `${a} and ${b} both map to output column "${countOutputNames(q)[b]}"`
  });
};

const CountQueryShape = z.object({
  source: Identifier,
  set: Identifier,
  feature: Identifier,
  n: Identifier.optional(),
  limit: z.number().int().positive().max(MAX_SOURCE_ROWS).optional()
});

export const CountQuerySchema = CountQueryShape.strict().superRefine(distinctOutputs);

export const SourceRequestSchema = CountQueryShape.extend({
  target: z.enum(['mysql', 'mongo', 'mongodb']),
  uninformative: z.boolean().optional(),
  unweighted: z.boolean().optional()
}).strict().superRefine(distinctOutputs);
export type SourceRequest = z.infer<typeof SourceRequestSchema>;
