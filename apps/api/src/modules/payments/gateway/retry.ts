import { logger } from "../../../core/logger";
import { incrementCounter } from "../../../core/metrics";

import { isGatewayError } from "./payment-gateway";

export type GatewayRetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  operation: string;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

const MAX_JITTER_MS = 150;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs a gateway call, retrying only `unreachable` failures with linear backoff
 * plus jitter. Every other error, including the final unreachable one, is rethrown.
 */
export async function withGatewayRetry<T>(
  call: () => Promise<T>,
  options: GatewayRetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await call();
    } catch (error) {
      if (!isGatewayError(error) || !error.retryable || attempt >= maxAttempts) {
        throw error;
      }

      const jitter = Math.floor(random() * MAX_JITTER_MS);
      const delayMs = options.baseDelayMs * attempt + jitter;
      incrementCounter("gateway_retry_total");
      logger.warn("[Gateway] Retrying unreachable gateway", {
        module: "payments",
        operation: options.operation,
        attempt,
        maxAttempts,
        delayMs,
        error: error.message,
      });
      await wait(delayMs);
    }
  }
}
