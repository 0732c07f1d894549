import { AxiosError, AxiosInstance, AxiosResponse, isAxiosError } from 'axios';
import axiosRetry from 'axios-retry';
import { CONFIG } from '../config/constants';
import { Logger, silentLogger } from '../utils/logger';
import { redactCredentials } from '../utils/redact';
import type { ScanSession } from './session';

export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxRetries: number;
  timeoutMs: number;
  rateLimitBaseWaitMs: number;
  serverErrorWaitMs: number;
  /** Random pause before every attempt, retries included. */
  minDelayMs: number;
  maxDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15',
] as const;

export function defaultHeaders(referer?: string): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)],
    Accept: 'application/json',
    'Accept-Language': 'en-US,en;q=0.9',
  };
  if (referer) {
    headers.Referer = referer;
    headers.Origin = new URL(referer).origin;
  }
  return headers;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/** Network failures, timeouts, 403, 408, 429 and 5xx are retried; other 4xx fail fast. */
export function isRetryableError(error: AxiosError): boolean {
  if (axiosRetry.isNetworkError(error)) return true;
  if (!error.response) return error.code !== undefined && TIMEOUT_CODES.has(error.code);

  const { status } = error.response;
  return status === 403 || status === 408 || status === 429 || status >= 500;
}

/**
 * Wait before retry number `retryCount` (1 for the first retry). Rate limits
 * and blocks back off exponentially from `rateLimitBaseWaitMs`; everything
 * else waits `serverErrorWaitMs` plus jitter.
 */
export function retryDelayMs(retryCount: number, status: number | undefined, policy: RetryPolicy): number {
  if (status === 429 || status === 403) {
    return 2 ** (retryCount - 1) * policy.rateLimitBaseWaitMs;
  }
  const jitterCeiling = Math.min(CONFIG.HTTP.JITTER_MS, policy.serverErrorWaitMs);
  return policy.serverErrorWaitMs + Math.random() * jitterCeiling;
}

export function requestDelayMs(policy: RetryPolicy): number {
  return policy.minDelayMs + Math.random() * (policy.maxDelayMs - policy.minDelayMs);
}

/**
 * Waits a random time from the policy's delay range before each request.
 * axios-retry re-sends through the instance, so retries are paced as well.
 */
export function applyRequestPacing(
  client: AxiosInstance,
  policy: RetryPolicy,
  wait: Sleep = sleep,
  logger: Logger = silentLogger,
): void {
  client.interceptors.request.use(async (config) => {
    const delay = requestDelayMs(policy);
    if (delay > 0) {
      await wait(delay);
      logger.debug(`Delayed ${(delay / 1000).toFixed(2)} seconds`);
    }
    return config;
  });
}

export function applyRetryPolicy(client: AxiosInstance, policy: RetryPolicy, logger: Logger = silentLogger): void {
  axiosRetry(client, {
    retries: Math.max(0, policy.maxRetries - 1),
    shouldResetTimeout: true,
    retryCondition: isRetryableError,
    retryDelay: (retryCount, error) => retryDelayMs(retryCount, error.response?.status, policy),
    onRetry: (retryCount, error, requestConfig) => {
      const url = redactCredentials(requestConfig.url ?? '');
      const reason = error.response ? `HTTP ${error.response.status}` : redactCredentials(error.message);
      logger.warn(`${reason} for ${url}, retrying (attempt ${retryCount + 1}/${policy.maxRetries})`);
    },
  });
}

export interface GetOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * GET through the session's retrying client. Resolves with the response, or
 * `null` once retries are exhausted or on a non-retryable client error.
 */
export async function getWithRetry(
  session: ScanSession,
  url: string,
  options: GetOptions = {},
  logger: Logger = silentLogger,
): Promise<AxiosResponse<string> | null> {
  try {
    return await session.client.get<string>(url, {
      headers: options.headers ?? defaultHeaders(),
      timeout: options.timeoutMs,
      responseType: 'text',
    });
  } catch (err) {
    const safeUrl = redactCredentials(url);
    if (isAxiosError(err)) {
      const status = err.response?.status;
      if (status !== undefined && status >= 400 && status < 500 && !isRetryableError(err)) {
        logger.error(`Client error (${status}) for ${safeUrl}. Failing immediately.`);
      } else {
        logger.error(
          `Failed to fetch ${safeUrl} after ${session.retryPolicy.maxRetries} attempts ` +
            `(last status: ${status ?? 'no response'})`,
        );
      }
    } else {
      logger.error(`Request for ${safeUrl} failed: ${redactCredentials(String(err))}`);
    }
    return null;
  }
}
