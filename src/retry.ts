import { setTimeout as delay } from "node:timers/promises";

export type RetryConfig = {
  retries: number;
  backoffMs: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
  sleep?: (ms: number) => Promise<unknown>;
};

export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig
): Promise<T> {
  const sleep = config.sleep ?? delay;
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= config.retries) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt === config.retries) break;
      if (config.shouldRetry && !config.shouldRetry(error)) break;
      const wait = config.backoffMs * Math.pow(2, attempt);
      config.onRetry?.(error, attempt + 1, wait);
      await sleep(wait);
      attempt += 1;
    }
  }

  throw lastError;
}
