import { Injectable } from '@nestjs/common';

export interface RetryConfig {
  maxRetries?: number;
  baseBackoffMs?: number;
  maxBackoffMs?: number;
  jitterMs?: number;
}

export interface RetryCallbacks {
  onRetry?: (attempt: number, delay: number, error: Error) => void;
  onMaxRetriesExceeded?: (maxRetries: number) => void;
}

export interface RetryPolicy {
  /** Errors not matched here are rethrown immediately */
  isRetryable: (error: unknown) => boolean;
  /** Builds the error thrown once every attempt has failed */
  exhausted: (attempts: number, lastError: unknown) => Error;
}

/**
 * Service that implements retry strategy with exponential backoff and jitter.
 */
@Injectable()
export class RetryStrategy {
  private readonly defaultConfig: Required<RetryConfig> = {
    maxRetries: 10,
    baseBackoffMs: 2,
    maxBackoffMs: 200,
    jitterMs: 5,
  };

  async executeWithRetry<T>(
    operation: () => Promise<T>,
    policy: RetryPolicy,
    callbacks?: RetryCallbacks,
    config?: RetryConfig,
  ): Promise<T> {
    const finalConfig = { ...this.defaultConfig, ...config };

    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        // Fail-fast: errors that should NOT be retried
        if (!policy.isRetryable(error)) {
          throw error;
        }

        if (attempt >= finalConfig.maxRetries - 1) {
          callbacks?.onMaxRetriesExceeded?.(finalConfig.maxRetries);
          throw policy.exhausted(finalConfig.maxRetries, error);
        }

        const delay = this.calculateDelay(attempt, finalConfig);
        callbacks?.onRetry?.(
          attempt + 1,
          delay,
          error instanceof Error ? error : new Error(String(error)),
        );

        await this.sleep(delay);
      }
    }
  }

  private calculateDelay(
    attempt: number,
    config: Required<RetryConfig>,
  ): number {
    const exponentialBackoff = Math.pow(2, attempt) * config.baseBackoffMs;
    const cappedBackoff = Math.min(exponentialBackoff, config.maxBackoffMs);
    const jitter = Math.random() * config.jitterMs;

    return cappedBackoff + jitter;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
