/**
 * Startup gate: keeps the service in "Starting" until its datastore accepts a
 * connection. Launch order from the orchestrator does not imply the
 * dependency is accepting connections yet.
 *
 * Delays follow capped exponential backoff (initialDelay * 2^(n-1), capped at
 * maxDelay) or stay constant at initialDelay. No jitter.
 */

import { BACKOFF, type Backoff } from "../constant";
import logger from "../logger/logger";
import { DependencyUnreachable } from "../utils/errors";
import { sleep } from "../utils/timeout/withTimeout";

const MAX_EXPONENT = 30;

export interface StartupGateOptions {
  /** 0 retries forever */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoff: Backoff;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Delay to wait after the `failedAttempt`-th failure (1-based).
 */
export function backoffDelay(
  failedAttempt: number,
  options: Pick<StartupGateOptions, "initialDelayMs" | "maxDelayMs" | "backoff">
): number {
  if (options.backoff === BACKOFF.CONSTANT) {
    return Math.min(options.initialDelayMs, options.maxDelayMs);
  }
  // capped so 0 * 2^n never turns into 0 * Infinity
  const exponentialDelay = options.initialDelayMs * Math.pow(2, Math.min(failedAttempt - 1, MAX_EXPONENT));
  return Math.min(exponentialDelay, options.maxDelayMs);
}

export async function waitForDependency<T>(
  dependency: string,
  connect: () => Promise<T>,
  options: StartupGateOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  const budget = options.maxAttempts === 0 ? "unbounded" : String(options.maxAttempts);
  let lastError = "Unknown error";

  for (let attempt = 1; options.maxAttempts === 0 || attempt <= options.maxAttempts; attempt++) {
    try {
      logger.info(`[StartupGate] Connecting to ${dependency} (attempt ${attempt}/${budget})`);
      const handle = await connect();
      logger.info(`[StartupGate] ${dependency} reachable after ${attempt} attempt(s)`);
      return handle;
    } catch (error) {
      lastError = error instanceof Error ? error.message : String(error);

      if (attempt === options.maxAttempts) {
        logger.error(`[StartupGate] ${dependency} attempt ${attempt} failed: ${lastError}`);
        break;
      }

      const delay = backoffDelay(attempt, options);
      logger.warn(`[StartupGate] ${dependency} attempt ${attempt} failed: ${lastError}; retrying in ${delay}ms`);
      await wait(delay);
    }
  }

  throw new DependencyUnreachable(dependency, options.maxAttempts, lastError);
}
