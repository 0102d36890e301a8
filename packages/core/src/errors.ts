export type LemmaErrorCode =
  | 'VALIDATION'
  | 'UNKNOWN_RECORD'
  | 'SELF_LOOP'
  | 'PATTERN'
  | 'PERSISTENCE'
  | 'IMPORT_CONFLICT';

/**
 * Base class for every error the ledger raises
 */
export class LemmaError extends Error {
  constructor(
    message: string,
    public readonly code: LemmaErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'LemmaError';
  }
}

export class ValidationError extends LemmaError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message, 'VALIDATION');
    this.name = 'ValidationError';
  }
}

export class UnknownRecordError extends LemmaError {
  constructor(public readonly recordId: string) {
    super(`Unknown lemma '${recordId}'`, 'UNKNOWN_RECORD');
    this.name = 'UnknownRecordError';
  }
}

export class SelfLoopError extends LemmaError {
  constructor(public readonly recordId: string) {
    super(`Lemma '${recordId}' cannot depend on itself`, 'SELF_LOOP');
    this.name = 'SelfLoopError';
  }
}

export class PatternError extends LemmaError {
  constructor(
    public readonly pattern: string,
    cause?: unknown,
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Invalid search pattern '${pattern}'${detail}`, 'PATTERN', { cause });
    this.name = 'PatternError';
  }
}

export class PersistenceError extends LemmaError {
  constructor(
    message: string,
    public readonly path?: string,
    cause?: unknown,
  ) {
    super(message, 'PERSISTENCE', { cause });
    this.name = 'PersistenceError';
  }
}

export class ImportConflictError extends LemmaError {
  constructor(public readonly conflictingIds: string[]) {
    super(
      `Import reuses ids of existing or deleted lemmas: ${conflictingIds.join(', ')}`,
      'IMPORT_CONFLICT',
    );
    this.name = 'ImportConflictError';
  }
}

export function isLemmaError(value: unknown): value is LemmaError {
  return value instanceof LemmaError;
}
