// core/domain/errors.ts

export type SearchErrorCode =
  | "normalization_failed"
  | "invalid_query"
  | "oracle_unavailable"
  | "not_found"
  | "internal_inconsistency";

export class SearchError extends Error {
  readonly code: SearchErrorCode;

  constructor(code: SearchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Raw resume had neither a name nor any usable experience. */
export class NormalizationError extends SearchError {
  declare readonly code: "normalization_failed";

  constructor(message: string, options?: { cause?: unknown }) {
    super("normalization_failed", message, options);
  }
}

export class ValidationError extends SearchError {
  readonly field: string;

  constructor(field: string, message: string) {
    super("invalid_query", message);
    this.field = field;
  }
}

/** Non-fatal: callers degrade to the keyword translator. */
export class OracleUnavailable extends SearchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("oracle_unavailable", message, options);
  }
}

export class NotFound extends SearchError {
  readonly candidateId: string;

  constructor(candidateId: string) {
    super("not_found", `Candidate ${candidateId} is not in the pool`);
    this.candidateId = candidateId;
  }
}

/** A graph or ordering invariant broke. Always a defect. */
export class InternalInconsistency extends SearchError {
  constructor(message: string) {
    super("internal_inconsistency", message);
  }
}

export function isSearchError(err: unknown): err is SearchError {
  return err instanceof SearchError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
