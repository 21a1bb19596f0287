// packages/core/src/errors.ts
import type { CellValue } from './types';

export const ErrorCodes = {
  EMPTY_INPUT: 'WLO_EMPTY_INPUT',
  DUPLICATE_ROW: 'WLO_DUPLICATE_ROW',
  INVALID_COUNT: 'WLO_INVALID_COUNT',
  DEGENERATE_TABLE: 'WLO_DEGENERATE_TABLE',
  COLUMN_NOT_FOUND: 'WLO_COLUMN_NOT_FOUND',
  SOURCE: 'WLO_SOURCE'
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

const show = (v: unknown): string => (typeof v === 'string' ? JSON.stringify(v) : String(v));

export class LogOddsError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class EmptyInputError extends LogOddsError {
  constructor() {
    super(ErrorCodes.EMPTY_INPUT, 'Count table has no rows; there are no sets or features to compare');
  }
}

export class DuplicateRowError extends LogOddsError {
  constructor(readonly set: CellValue, readonly feature: CellValue, rowIndex: number) {
    super(
      ErrorCodes.DUPLICATE_ROW,
      `More than one row for set ${show(set)} and feature ${show(feature)} (first repeat at row ${rowIndex})`,
      { set, feature, rowIndex }
    );
  }
}

export class InvalidCountError extends LogOddsError {
  constructor(message: string, details: Record<string, unknown>) {
    super(ErrorCodes.INVALID_COUNT, message, details);
  }

  static atRow(column: string, rowIndex: number, value: unknown): InvalidCountError {
    const reason = typeof value === 'number' ? 'negative or non-finite' : 'non-numeric';
    return new InvalidCountError(
      `Count column "${column}" has a ${reason} value ${show(value)} at row ${rowIndex}`,
      { column, rowIndex, value: value === undefined ? null : value }
    );
  }

  static zeroFeature(column: string, feature: CellValue): InvalidCountError {
    return new InvalidCountError(
      `Feature ${show(feature)} has a total count of 0 in "${column}"; the empirical prior needs a positive total`,
      { column, feature }
    );
  }
}

export class DegenerateTableError extends LogOddsError {
  constructor(readonly set: CellValue) {
    super(
      ErrorCodes.DEGENERATE_TABLE,
      `Set ${show(set)} holds a single feature; its odds against the rest of the set are undefined`,
      { set }
    );
  }
}

export class ColumnNotFoundError extends LogOddsError {
  constructor(ref: string | number, columns: string[]) {
    super(
      ErrorCodes.COLUMN_NOT_FOUND,
      typeof ref === 'number'
        ? `Column index ${ref} is out of range (table has ${columns.length} columns)`
        : `Cannot resolve column: ${ref}`,
      { ref, columns }
    );
  }
}

export class SourceError extends LogOddsError {
  constructor(source: string, message: string, cause?: unknown) {
    super(ErrorCodes.SOURCE, `[${source}] ${message}`, { source });
    if (cause !== undefined) this.cause = cause;
  }
}

export function isLogOddsError(e: unknown): e is LogOddsError {
  return e instanceof LogOddsError;
}
