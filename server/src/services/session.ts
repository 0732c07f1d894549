import http from 'http';
import https from 'https';
import axios, { AxiosAdapter, AxiosInstance, AxiosProxyConfig } from 'axios';
import { env } from '../config/env';
import { DelayRange, ProxyMode, RetailerConfig, selectDelays } from '../config/retailers';
import { ScanSetupError } from '../utils/errors';
import { Logger, silentLogger } from '../utils/logger';
import { redactCredentials } from '../utils/redact';
import { applyRequestPacing, applyRetryPolicy, RetryPolicy, Sleep } from './http';

export interface SessionOptions {
  retailer: string;
  proxyMode: ProxyMode;
  proxyUrl?: string;
  retryPolicy: RetryPolicy;
  logger?: Logger;
  /** Replaces the network transport; used by tests. */
  adapter?: AxiosAdapter;
  /** Replaces the pause between requests; used by tests. */
  sleep?: Sleep;
}

/** One worker's HTTP client. Not shared between workers. */
export interface ScanSession {
  readonly client: AxiosInstance;
  readonly proxyMode: ProxyMode;
  readonly retryPolicy: RetryPolicy;
  readonly options: SessionOptions;
  close(): void;
}

export type SessionFactory = () => ScanSession;

export function retryPolicyFromEnv(delays: DelayRange): RetryPolicy {
  return {
    maxRetries: env.HTTP_MAX_RETRIES,
    timeoutMs: env.HTTP_TIMEOUT_MS,
    rateLimitBaseWaitMs: env.RATE_LIMIT_BASE_WAIT_MS,
    serverErrorWaitMs: env.SERVER_ERROR_WAIT_MS,
    minDelayMs: delays.minMs,
    maxDelayMs: delays.maxMs,
  };
}

export function sessionOptionsFor(retailer: RetailerConfig, logger?: Logger): SessionOptions {
  return {
    retailer: retailer.name,
    proxyMode: retailer.proxy.mode,
    proxyUrl: env.PROXY_URL,
    retryPolicy: retryPolicyFromEnv(selectDelays(retailer)),
    logger,
  };
}

function toAxiosProxy(proxyUrl: string): AxiosProxyConfig {
  let url: URL;
  try {
    url = new URL(proxyUrl);
  } catch {
    throw new ScanSetupError(`Invalid proxy URL: ${redactCredentials(proxyUrl)}`);
  }

  const protocol = url.protocol.replace(/:$/, '');
  const proxy: AxiosProxyConfig = {
    protocol,
    host: url.hostname,
    port: url.port ? Number(url.port) : protocol === 'https' ? 443 : 80,
  };
  if (url.username) {
    proxy.auth = {
      username: decodeURIComponent(url.username),
      password: decodeURIComponent(url.password),
    };
  }
  return proxy;
}

/**
 * Direct mode talks to the provider without a proxy. Proxied modes route
 * through `proxyUrl`; without one the session logs and falls back to direct.
 */
export function createSession(options: SessionOptions): ScanSession {
  const logger = options.logger ?? silentLogger;
  let proxyMode = options.proxyMode;
  let proxy: AxiosProxyConfig | false = false;

  if (proxyMode !== 'direct') {
    if (options.proxyUrl) {
      proxy = toAxiosProxy(options.proxyUrl);
    } else {
      logger.error(`[${options.retailer}] Missing proxy URL for ${proxyMode} mode, falling back to direct`);
      proxyMode = 'direct';
    }
  }

  const httpAgent = new http.Agent({ keepAlive: true });
  const httpsAgent = new https.Agent({ keepAlive: true });

  const client = axios.create({
    timeout: options.retryPolicy.timeoutMs,
    proxy,
    httpAgent,
    httpsAgent,
    adapter: options.adapter,
  });
  applyRequestPacing(client, options.retryPolicy, options.sleep, logger);
  applyRetryPolicy(client, options.retryPolicy, logger);

  return {
    client,
    proxyMode,
    retryPolicy: options.retryPolicy,
    options,
    close: () => {
      httpAgent.destroy();
      httpsAgent.destroy();
    },
  };
}

/** Each call yields a fresh session configured like the others. */
export function createSessionFactory(options: SessionOptions): SessionFactory {
  if (options.proxyMode !== 'direct' && options.proxyUrl) {
    // Surface a malformed proxy URL once, before any worker starts
    toAxiosProxy(options.proxyUrl);
  }
  return () => createSession(options);
}
