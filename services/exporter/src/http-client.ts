import axios, { AxiosAdapter, AxiosInstance } from "axios";
import axiosRetry from "axios-retry";
import * as https from "https";

/** Transport-level retry, applied below credential failover. */
export interface TransportRetryPolicy {
  retries: number;
  baseDelayMs: number;
  retryStatuses: readonly number[];
}

export const DEFAULT_RETRY_POLICY: TransportRetryPolicy = {
  retries: 3,
  baseDelayMs: 500,
  retryStatuses: [500, 502, 503, 504],
};

export const REQUEST_TIMEOUT_MS = 10_000;

const TIMEOUT_CODES = ["ECONNABORTED", "ETIMEDOUT"];

export interface HttpClientOptions {
  policy?: TransportRetryPolicy;
  timeoutMs?: number;
  /** Replaces the network layer; tests pass an in-process fake here. */
  adapter?: AxiosAdapter;
}

/** Backoff for the nth retry: base, 2×base, 4×base, ... */
export function retryDelayMs(policy: TransportRetryPolicy, retryCount: number): number {
  return policy.baseDelayMs * Math.pow(2, Math.max(0, retryCount - 1));
}

// Shared axios instance: keep-alive, IPv4 forced, max 50 concurrent sockets
export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;

  const httpClient = axios.create({
    timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
    httpsAgent: new https.Agent({ family: 4, maxSockets: 50, keepAlive: true }),
    adapter: options.adapter,
  });

  axiosRetry(httpClient, {
    retries: policy.retries,
    shouldResetTimeout: true,
    retryCondition: (err) => {
      if (err.config?.method !== "get") return false;
      const status = err.response?.status ?? 0;
      // isNetworkError leaves out timeouts; each attempt gets its own timeout, so retry those too
      const timedOut = !err.response && TIMEOUT_CODES.includes(err.code ?? "");
      return axiosRetry.isNetworkError(err) || timedOut || policy.retryStatuses.includes(status);
    },
    retryDelay: (retryCount) => retryDelayMs(policy, retryCount),
    onRetry: (retryCount, err) => {
      console.warn(`[http] retry ${retryCount}/${policy.retries} — ${err.message}`);
    },
  });

  return httpClient;
}
