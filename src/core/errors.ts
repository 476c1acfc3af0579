/**
 * Error taxonomy for ocrsift.
 *
 * Every error carries a machine-readable `code`, optional structured `details`
 * and the underlying `cause` when one exists.
 */

export const ERROR_CODES = {
  INVALID_RULE_SET: 'INVALID_RULE_SET',
  DECODING_ERROR: 'DECODING_ERROR',
  CONFIG_ERROR: 'CONFIG_ERROR',
  STATS_FINALIZED: 'STATS_FINALIZED',
  STATS_NOT_FINALIZED: 'STATS_NOT_FINALIZED',
  READ_ERROR: 'READ_ERROR',
  WRITE_ERROR: 'WRITE_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class OcrSiftError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A rule set failed validation. Raised before any text is processed. */
export class InvalidRuleSetError extends OcrSiftError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ERROR_CODES.INVALID_RULE_SET, message, details);
  }
}

/** Input bytes could not be interpreted as text in the declared encoding. */
export class DecodingError extends OcrSiftError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(ERROR_CODES.DECODING_ERROR, message, details, cause);
  }
}

export class ConfigError extends OcrSiftError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(ERROR_CODES.CONFIG_ERROR, message, details, cause);
  }
}

/** An output file could not be written, or two inputs map to the same output. */
export class WriteError extends OcrSiftError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(ERROR_CODES.WRITE_ERROR, message, details, cause);
  }
}

export class StatsFinalizedError extends OcrSiftError {
  constructor(message = 'Stats have already been finalized') {
    super(ERROR_CODES.STATS_FINALIZED, message);
  }
}

export function errorCode(err: unknown): string {
  if (err instanceof OcrSiftError) return err.code;
  return ERROR_CODES.READ_ERROR;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
