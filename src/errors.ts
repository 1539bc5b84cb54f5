/**
 * Error taxonomy for the Guardian gate.
 *
 * Custody verification failures are not errors: they are reported through
 * `CustodyReport.final_pass` so a failing bundle is always returned.
 */

export enum ErrorCode {
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  CONFIG_INVALID = 'CONFIG_INVALID',
  INTEGRITY_BROKEN = 'INTEGRITY_BROKEN',
  GENERATION_TIMEOUT = 'GENERATION_TIMEOUT',
  GENERATION_FAILED = 'GENERATION_FAILED'
}

export class GuardianError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Malformed input. Raised before anything is written to the ledger. */
export class ValidationError extends GuardianError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_FAILED, message, details);
  }
}

/** Malformed configuration or rule set. Fatal at startup. */
export class ConfigError extends GuardianError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONFIG_INVALID, message, details);
  }
}

/** Hash-chain mismatch. The ledger stops accepting writes once raised. */
export class IntegrityError extends GuardianError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.INTEGRITY_BROKEN, message, details);
  }
}

export class GenerationTimeoutError extends GuardianError {
  constructor(timeoutMs: number, attempts: number) {
    super(ErrorCode.GENERATION_TIMEOUT, `Generation backend did not answer within ${timeoutMs}ms`, {
      timeout_ms: timeoutMs,
      attempts
    });
  }
}

export class GenerationError extends GuardianError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.GENERATION_FAILED, message, details);
  }
}

export function isGuardianError(error: unknown): error is GuardianError {
  return error instanceof GuardianError;
}
