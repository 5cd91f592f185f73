/**
 * Retry policy utilities for calls to external collaborators
 * Implements exponential backoff with jitter for resilient error handling
 */
import { LoggingWrapper } from "./logging.js";

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitterMs: number;
}

export interface RetryableError extends Error {
  isRetryable: boolean;
}

const RETRYABLE_PATTERNS = [
  /timeout/i,
  /timed out/i,
  /network/i,
  /connection/i,
  /throttle/i,
  /rate limit/i,
  /service unavailable/i,
  /internal server error/i,
  /bad gateway/i,
  /temporary/i,
  /EAGAIN/,
  /ECONNRESET/,
];

function hasRetryableFlag(error: Error): error is RetryableError {
  return "isRetryable" in error && typeof error.isRetryable === "boolean";
}

export class RetryPolicy {
  private config: RetryConfig;

  constructor(
    config: Partial<RetryConfig> = {},
    private readonly logger: LoggingWrapper = new LoggingWrapper("retry-policy")
  ) {
    this.config = {
      maxAttempts: config.maxAttempts ?? 3,
      baseDelayMs: config.baseDelayMs ?? 1000,
      maxDelayMs: config.maxDelayMs ?? 30000,
      backoffMultiplier: config.backoffMultiplier ?? 2,
      jitterMs: config.jitterMs ?? 1000,
    };
  }

  /**
   * Execute a function with retry logic
   */
  async execute<T>(fn: () => Promise<T>, context?: string): Promise<T> {
    let lastError: unknown = new Error("Retry policy made no attempts");

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (error) {
        lastError = error;

        if (!this.isRetryableError(error)) {
          throw error;
        }

        if (attempt === this.config.maxAttempts) {
          break;
        }

        const delay = this.calculateDelay(attempt);
        const errorMessage =
          error instanceof Error ? error.message : String(error);
        const message = `Retry attempt ${attempt}/${this.config.maxAttempts} failed${context ? ` for ${context}` : ""}: ${errorMessage}. Retrying in ${delay}ms`;
        this.logger.warn(message, { attempt, delayMs: delay, context });

        await this.sleep(delay);
      }
    }

    throw lastError;
  }

  /**
   * Check if an error is retryable
   */
  isRetryableError(error: unknown): boolean {
    if (!(error instanceof Error)) {
      return false;
    }
    if (hasRetryableFlag(error)) {
      return error.isRetryable;
    }
    return RETRYABLE_PATTERNS.some(pattern => pattern.test(error.message));
  }

  /**
   * Calculate delay with exponential backoff and jitter
   */
  private calculateDelay(attempt: number): number {
    const exponentialDelay =
      this.config.baseDelayMs *
      Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);
    const jitter = Math.random() * this.config.jitterMs;

    return Math.floor(cappedDelay + jitter);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

/**
 * Predefined retry configurations for the collaborators a render calls
 */
export const RetryConfigs = {
  // Narration engine - slow upstream, moderate retry
  narration: {
    maxAttempts: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    backoffMultiplier: 2,
    jitterMs: 1000,
  },

  // ffprobe on uploaded media - quick retry for transient I/O errors
  probe: {
    maxAttempts: 2,
    baseDelayMs: 250,
    maxDelayMs: 2000,
    backoffMultiplier: 2,
    jitterMs: 100,
  },
} as const;
