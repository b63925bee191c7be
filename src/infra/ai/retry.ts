import pRetry, { AbortError, type FailedAttemptError } from "p-retry";
import type { Logger } from "pino";
import type { RetryPolicy } from "../../config/env.js";

/**
 * HTTP failure from a model backend. 408, 429 and 5xx responses are marked
 * transient and retried; anything else is permanent.
 */
export class ProviderRequestError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly transient: boolean,
  ) {
    super(message);
    this.name = "ProviderRequestError";
  }

  static fromStatus(provider: string, status: number, body: string): ProviderRequestError {
    const transient = status === 408 || status === 429 || status >= 500;
    return new ProviderRequestError(
      `${provider} request failed (${status}): ${body.slice(0, 500)}`,
      status,
      transient,
    );
  }
}

export function isTransientFailure(error: unknown): boolean {
  if (error instanceof ProviderRequestError) {
    return error.transient;
  }
  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return true;
  }
  return error instanceof TypeError && error.message === "fetch failed";
}

export interface RetryContext {
  label: string;
  logger: Logger;
}

/**
 * Runs `task` with a fresh timeout signal per attempt and exponential
 * backoff between attempts. Permanent failures stop the loop immediately and
 * are rethrown as-is.
 */
export async function callWithRetry<T>(
  task: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  { label, logger }: RetryContext,
): Promise<T> {
  return pRetry(
    async () => {
      try {
        return await task(AbortSignal.timeout(policy.timeoutMs));
      } catch (error) {
        if (!isTransientFailure(error)) {
          throw new AbortError(error instanceof Error ? error : String(error));
        }
        throw error;
      }
    },
    {
      retries: Math.max(0, policy.attempts - 1),
      factor: 2,
      minTimeout: policy.minDelayMs,
      maxTimeout: policy.maxDelayMs,
      randomize: false,
      onFailedAttempt: (error: FailedAttemptError) => {
        logger.warn(
          {
            attemptNumber: error.attemptNumber,
            retriesLeft: error.retriesLeft,
            error: error.message,
          },
          `${label} failed attempt`,
        );
      },
    },
  );
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
