/**
 * AWS Retry Runner
 *
 * Retries throttled and transient AWS SDK failures with exponential backoff.
 * Inventory adapters wrap every `client.send` in it; analyzers never retry.
 */

import { formatErrorMessage } from "../../../src/plugin-sdk/index.js";
import type { Logger } from "../../../src/plugin-sdk/index.js";

export { formatErrorMessage };

/**
 * Retry configuration options
 */
export type RetryConfig = {
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitter?: number;
};

/**
 * Retry attempt information
 */
export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

type RetryOptions = Required<RetryConfig> & {
  label?: string;
  shouldRetry: (err: unknown, attempt: number) => boolean;
  retryAfterMs: (err: unknown) => number | undefined;
  onRetry: (info: RetryInfo) => void;
};

/**
 * Default retry configuration for AWS API calls
 */
export const AWS_RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 3,
  minDelayMs: 100,
  maxDelayMs: 30_000,
  jitter: 0.2,
};

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

function readProperty(err: unknown, key: string): unknown {
  if (!err || typeof err !== "object") return undefined;
  return Reflect.get(err, key);
}

/**
 * Extract error code from an error object
 */
export function extractErrorCode(err: unknown): string | undefined {
  const code = readProperty(err, "code");
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

function extractStatusCode(err: unknown): number | undefined {
  const status = readProperty(readProperty(err, "$metadata"), "httpStatusCode");
  return typeof status === "number" ? status : undefined;
}

export function resolveRetryConfig(overrides?: RetryConfig): Required<RetryConfig> {
  const defaults = AWS_RETRY_DEFAULTS;
  const attempts = Math.max(1, Math.round(overrides?.attempts ?? defaults.attempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? defaults.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? defaults.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides?.jitter ?? defaults.jitter));
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

function applyJitter(delayMs: number, jitter: number): number {
  if (jitter <= 0) return delayMs;
  const offset = (Math.random() * 2 - 1) * jitter;
  return Math.max(0, Math.round(delayMs * (1 + offset)));
}

async function retryAsync<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { attempts: maxAttempts, minDelayMs, maxDelayMs, jitter } = options;
  let lastErr: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      lastErr = err;
      if (attempt >= maxAttempts || !options.shouldRetry(err, attempt)) break;

      const retryAfterMs = options.retryAfterMs(err);
      const baseDelay =
        retryAfterMs !== undefined ? Math.max(retryAfterMs, minDelayMs) : minDelayMs * 2 ** (attempt - 1);
      let delay = Math.min(baseDelay, maxDelayMs);
      delay = applyJitter(delay, jitter);
      delay = Math.min(Math.max(delay, minDelayMs), maxDelayMs);

      options.onRetry({ attempt, maxAttempts, delayMs: delay, err, label: options.label });
      await sleep(delay);
    }
  }

  throw lastErr ?? new Error("Retry failed");
}

// =============================================================================
// AWS-Specific Retry Logic
// =============================================================================

/**
 * Pattern matching AWS throttling and transient errors
 */
const AWS_RETRY_PATTERN =
  /throttl|rate exceeded|503|504|timeout|ECONNRESET|ETIMEDOUT|TooManyRequestsException|ServiceUnavailable|RequestLimitExceeded|SlowDown/i;

/**
 * AWS error codes that should always be retried
 */
const AWS_RETRYABLE_CODES = new Set([
  "ThrottlingException",
  "Throttling",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "ServiceUnavailable",
  "ServiceUnavailableException",
  "InternalError",
  "InternalServiceError",
  "InternalServerError",
  "EC2ThrottledException",
  "RequestThrottled",
  "RequestTimeout",
  "PriorRequestNotComplete",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "ECONNREFUSED",
]);

/**
 * Extract retry-after delay from AWS error response
 */
export function getAWSRetryAfterMs(err: unknown): number | undefined {
  const status = extractStatusCode(err);
  if (status !== 429 && status !== 503) return undefined;

  const headers = readProperty(readProperty(err, "$response"), "headers");
  const retryAfter = readProperty(headers, "retry-after");
  if (typeof retryAfter === "string") {
    const seconds = parseInt(retryAfter, 10);
    if (!Number.isNaN(seconds)) return seconds * 1000;
  }
  return undefined;
}

/**
 * Determine if an AWS error should be retried
 */
export function shouldRetryAWSError(err: unknown, _attempt: number): boolean {
  if (!err) return false;

  const code = extractErrorCode(err);
  if (code && AWS_RETRYABLE_CODES.has(code)) return true;

  if (err instanceof Error && AWS_RETRYABLE_CODES.has(err.name)) return true;

  const statusCode = extractStatusCode(err);
  if (statusCode === 429 || statusCode === 500 || statusCode === 502 || statusCode === 503 || statusCode === 504) {
    return true;
  }

  return AWS_RETRY_PATTERN.test(formatErrorMessage(err));
}

export type AWSRetryOptions = {
  retry?: RetryConfig;
  logger?: Logger;
  onRetry?: (info: RetryInfo) => void;
};

export type AWSRetryRunner = <T>(fn: () => Promise<T>, label?: string) => Promise<T>;

/**
 * Create an AWS retry runner function
 *
 * @example
 * ```typescript
 * const retry = createAWSRetryRunner({ retry: config.retry, logger });
 * const page = await retry(() => ec2.send(new DescribeVolumesCommand({})), "DescribeVolumes");
 * ```
 */
export function createAWSRetryRunner(options: AWSRetryOptions = {}): AWSRetryRunner {
  const config = resolveRetryConfig(options.retry);

  return async function awsRetry<T>(fn: () => Promise<T>, label?: string): Promise<T> {
    return retryAsync(fn, {
      ...config,
      label,
      shouldRetry: shouldRetryAWSError,
      retryAfterMs: getAWSRetryAfterMs,
      onRetry: (info) => {
        options.logger?.warn(
          `[aws] ${info.label ?? "operation"} throttled, retry ${info.attempt}/${info.maxAttempts} in ${info.delayMs}ms`,
        );
        options.onRetry?.(info);
      },
    });
  };
}
