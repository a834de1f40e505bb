import { setTimeout as delay } from "node:timers/promises";
import { RetryExhaustedError, describeError } from "../errors.js";
import { REMOTE_BASE_DELAY_MS, REMOTE_MAX_ATTEMPTS } from "../constants.js";
import type { Logger } from "../logger.js";

export interface RetryOptions {
  label: string;
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Pick<Logger, "warn">;
}

const defaultSleep = (ms: number): Promise<void> => delay(ms);

/**
 * Runs `operation` up to `maxAttempts` times, waiting
 * `baseDelayMs * 2^(attempt - 1)` between attempts. Throws a
 * RetryExhaustedError carrying the last failure as its cause.
 */
export async function runWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  {
    label,
    maxAttempts = REMOTE_MAX_ATTEMPTS,
    baseDelayMs = REMOTE_BASE_DELAY_MS,
    sleep = defaultSleep,
    logger,
  }: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, Math.floor(maxAttempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (err) {
      lastError = err;
      if (attempt < attempts) {
        const waitMs = baseDelayMs * 2 ** (attempt - 1);
        logger?.warn(
          { attempt, maxAttempts: attempts, delayMs: waitMs },
          `${label} failed (attempt ${attempt}/${attempts}): ${describeError(err)}. Retrying in ${waitMs}ms`
        );
        await sleep(waitMs);
      }
    }
  }

  throw new RetryExhaustedError(label, attempts, lastError);
}
