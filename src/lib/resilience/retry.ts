// /src/lib/resilience/retry.ts

import { errorMessage } from "../errors";
import { createLogger, type Logger } from "../log/logger";

export type Sleep = (ms: number) => Promise<void>;

export type RetryOptions = {
  /** Total attempts, including the first. Default 3. */
  maxAttempts?: number;
  /** Wait before retry i (0-indexed) is base^i units. Default 2. */
  backoffBase?: number;
  /** Length of one backoff unit. Default 1000 (seconds). */
  unitMs?: number;
  sleep?: Sleep;
  logger?: Logger;
};

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export function backoffMs(attempt: number, base = 2, unitMs = 1000): number {
  return Math.pow(base, attempt) * unitMs;
}

/**
 * Runs a remote call, retrying every failure with exponential backoff.
 *
 * Attempts run strictly one after another. Failures before the last attempt are
 * logged as warnings; the last one is logged as an error and re-thrown unchanged.
 * Not tied to any transport: record-store and text-generation calls share it.
 */
export class RetryExecutor {
  private readonly maxAttempts: number;
  private readonly backoffBase: number;
  private readonly unitMs: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;

  constructor(opts?: RetryOptions) {
    this.maxAttempts = assertAttempts(opts?.maxAttempts ?? 3);
    this.backoffBase = opts?.backoffBase ?? 2;
    this.unitMs = opts?.unitMs ?? 1000;
    this.sleep = opts?.sleep ?? sleep;
    this.logger = opts?.logger ?? createLogger("RETRY");
  }

  async execute<T>(
    operation: () => Promise<T>,
    maxAttempts: number = this.maxAttempts,
    label = "Request",
  ): Promise<T> {
    assertAttempts(maxAttempts);

    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (err) {
        if (attempt >= maxAttempts - 1) {
          this.logger.error(`${label} failed after ${maxAttempts} attempts: ${errorMessage(err)}`);
          throw err;
        }

        const waitMs = backoffMs(attempt, this.backoffBase, this.unitMs);
        this.logger.warn(`${label} failed, retrying in ${waitMs}ms: ${errorMessage(err)}`);
        await this.sleep(waitMs);
      }
    }
  }
}

function assertAttempts(n: number): number {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1 (got ${n})`);
  }
  return n;
}
