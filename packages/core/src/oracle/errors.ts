/**
 * Errors thrown across the oracle seam. The orchestrator catches both and never lets them escape.
 */
export class OracleCallError extends Error {
  readonly transient: boolean;
  readonly attempts: number;

  constructor(message: string, options: { transient: boolean; attempts: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'OracleCallError';
    this.transient = options.transient;
    this.attempts = options.attempts;
  }
}

export class OracleCancelledError extends Error {
  constructor(reason: string) {
    super(`Cancelled before ${reason}`);
    this.name = 'OracleCancelledError';
  }
}

export class OracleTimeoutError extends Error {
  constructor(timeoutMs: number, reason: string) {
    super(`Oracle call timeout after ${timeoutMs}ms: ${reason}`);
    this.name = 'OracleTimeoutError';
  }
}
