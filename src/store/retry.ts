/**
 * Retry with exponential backoff for record store calls.
 *
 * Only transient failures are retried: timeouts, dropped connections and the
 * PostgreSQL SQLSTATEs for admin shutdown (57P01) and connection exceptions
 * (class 08). Anything else is rethrown on the first attempt so batch-level
 * error handling sees the original error.
 */

import { SyncError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("retry");

export type TransientErrorType = "timeout" | "connection" | "server_shutdown";

export interface RetryConfig {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
  readonly jitterFactor: number;
}

export interface RetryAttempt {
  readonly attemptNumber: number;
  readonly delayMs: number;
  readonly error: string;
}

export class RetryExhaustedError extends SyncError {
  constructor(
    public readonly operation: string,
    public readonly attempts: readonly RetryAttempt[],
    public readonly lastError: unknown,
  ) {
    super(`${operation} failed after ${attempts.length} attempts: ${errorMessage(lastError)}`, {
      operation,
      attempts: attempts.length,
    });
    this.name = "RetryExhaustedError";
  }
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 200,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
};

function sqlState(error: unknown): string | null {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

export function classifyTransientError(error: unknown): TransientErrorType | null {
  const code = sqlState(error);
  if (code === "57P01") return "server_shutdown";
  if (code !== null && code.startsWith("08")) return "connection";
  if (code === "57014") return "timeout"; // statement_timeout cancellation
  if (code === "ECONNRESET" || code === "ECONNREFUSED" || code === "EPIPE") return "connection";
  if (code === "ETIMEDOUT") return "timeout";

  const message = errorMessage(error).toLowerCase();
  if (message.includes("timeout") || message.includes("timed out")) return "timeout";
  if (
    message.includes("connection terminated") ||
    message.includes("econnreset") ||
    message.includes("econnrefused")
  ) {
    return "connection";
  }
  return null;
}

export class RetryPolicy {
  private readonly config: RetryConfig;

  constructor(
    config: Partial<RetryConfig> = {},
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep,
    private readonly random: () => number = Math.random,
  ) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  async execute<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const attempts: RetryAttempt[] = [];

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        const transient = classifyTransientError(error);
        if (transient === null) throw error;

        const delayMs = this.calculateDelay(attempt);
        attempts.push({ attemptNumber: attempt, delayMs, error: errorMessage(error) });

        if (attempt >= this.config.maxAttempts) {
          throw new RetryExhaustedError(operation, attempts, error);
        }

        log.warn(`${operation} hit a ${transient} error, retrying`, {
          attempt,
          delayMs,
          error: errorMessage(error),
        });
        await this.sleep(delayMs);
      }
    }
  }

  calculateDelay(attempt: number): number {
    const exponential = this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const capped = Math.min(exponential, this.config.maxDelayMs);
    const jitterRange = capped * this.config.jitterFactor;
    const jitter = this.random() * 2 * jitterRange - jitterRange;
    return Math.max(0, Math.floor(capped + jitter));
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
