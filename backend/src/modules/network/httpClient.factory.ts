/**
 * HTTP Client Factory
 * ===================
 *
 * Creates axios clients with retry/backoff and optional proxy.
 * All price providers MUST use this factory.
 */

import axios, { AxiosError, AxiosInstance, AxiosRequestConfig, InternalAxiosRequestConfig } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';

export interface RetryPolicy {
  attempts: number;
  backoffMs: number;
  maxBackoffMs: number;
}

export interface HttpClientOptions {
  baseURL: string;
  timeoutMs: number;
  proxyUrl?: string;
  retry?: Partial<RetryPolicy>;
  params?: Record<string, string>;
  headers?: Record<string, string>;
}

const DEFAULT_RETRY: RetryPolicy = {
  attempts: 2,
  backoffMs: 500,
  maxBackoffMs: 5_000,
};

type RetryableConfig = InternalAxiosRequestConfig & { _retryCount?: number };

// 4xx other than 429 will not get better by asking again
function isRetryable(error: AxiosError): boolean {
  const status = error.response?.status;
  if (status === undefined) return true;
  return status === 429 || status >= 500;
}

export function backoffDelay(policy: RetryPolicy, retryCount: number): number {
  return Math.min(policy.backoffMs * Math.pow(2, retryCount - 1), policy.maxBackoffMs);
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const retry: RetryPolicy = { ...DEFAULT_RETRY, ...options.retry };

  const axiosConfig: AxiosRequestConfig = {
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    params: options.params,
    headers: {
      'User-Agent': 'Mozilla/5.0 (compatible; RSTournament/1.0)',
      ...options.headers,
    },
  };

  if (options.proxyUrl) {
    const agent = new HttpsProxyAgent(options.proxyUrl);
    axiosConfig.httpsAgent = agent;
    axiosConfig.httpAgent = agent;
    axiosConfig.proxy = false; // agent handles it
  }

  const client = axios.create(axiosConfig);

  client.interceptors.response.use(
    response => response,
    async (error: unknown) => {
      if (!axios.isAxiosError(error) || !error.config || !isRetryable(error)) {
        throw error;
      }

      const originalRequest: RetryableConfig = error.config;
      const retryCount = (originalRequest._retryCount ?? 0) + 1;
      if (retryCount > retry.attempts) {
        throw error;
      }
      originalRequest._retryCount = retryCount;

      await new Promise(resolve => setTimeout(resolve, backoffDelay(retry, retryCount)));

      return client(originalRequest);
    }
  );

  return client;
}
