import OpenAI from 'openai';
import { ORACLE_MAX_RETRIES, ORACLE_RETRY_BASE_DELAY_MS } from '../constants';
import { OracleCallError, OracleCancelledError, OracleTimeoutError } from './errors';

export type OracleCallOptions = {
  timeoutMs: number;
  /** Retries after the first attempt; only transient failures are retried. */
  maxRetries?: number;
  baseDelayMs?: number;
  /** Reason for the call (for logging) */
  reason: string;
  /** Shared cancellation signal. Checked before every attempt; never aborts a running attempt. */
  cancelSignal?: AbortSignal;
};

/**
 * Timeouts, dropped connections, rate limits and server errors are worth another attempt.
 * Other API errors (bad request, auth) are not.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof OracleTimeoutError) return true;
  if (error instanceof OpenAI.APIConnectionError) return true;
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    return status === undefined || status === 408 || status === 429 || status >= 500;
  }
  return error instanceof Error;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run one oracle request with a per-attempt timeout and exponential backoff.
 * The request receives a signal that fires when its attempt times out.
 *
 * Throws OracleCancelledError when cancellation is seen before an attempt,
 * OracleCallError once the failure is permanent or retries are exhausted.
 */
export async function executeOracleCall(
  request: (signal: AbortSignal) => Promise<string>,
  options: OracleCallOptions
): Promise<string> {
  const maxRetries = options.maxRetries ?? ORACLE_MAX_RETRIES;
  const baseDelayMs = options.baseDelayMs ?? ORACLE_RETRY_BASE_DELAY_MS;
  const { timeoutMs, reason } = options;

  console.log(`[API Call] ${reason}`);

  for (let attempt = 0; ; attempt++) {
    if (options.cancelSignal?.aborted) {
      throw new OracleCancelledError(reason);
    }

    const startTime = Date.now();
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new OracleTimeoutError(timeoutMs, reason));
      }, timeoutMs);
    });

    try {
      const content = await Promise.race([request(controller.signal), timeout]);
      console.log(`[API Call] Completed in ${Date.now() - startTime}ms: ${reason}`);
      return content;
    } catch (error) {
      const duration = Date.now() - startTime;
      const transient = isTransientError(error);
      const attempts = attempt + 1;
      const message = error instanceof Error ? error.message : String(error);

      if (!transient || attempt >= maxRetries) {
        console.warn(`[API Call] Error after ${attempts} attempts (${duration}ms): ${reason} - ${message}`);
        throw new OracleCallError(`Error after ${attempts} attempts: ${message}`, {
          transient,
          attempts,
          cause: error,
        });
      }

      const delay = baseDelayMs * 2 ** attempt;
      console.warn(`[API Call] Attempt ${attempts} failed after ${duration}ms: ${reason} - retrying in ${delay}ms`);
      await sleep(delay);
    } finally {
      clearTimeout(timer);
    }
  }
}
