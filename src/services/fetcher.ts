import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosProxyConfig,
  type AxiosRequestConfig,
  type AxiosResponse,
} from 'axios';

import { config } from '../config/index.js';
import { RETRY, SIZE_LIMITS } from '../config/constants.js';
import type {
  Transport,
  TransportRequestOptions,
  TransportResponse,
} from '../config/types.js';

import { mapFetchError } from './fetcher/errors.js';
import {
  assertSuccessStatus,
  handleRequest,
  handleResponse,
  handleResponseError,
} from './fetcher/interceptors.js';
import { RetryPolicy } from './fetcher/retry-policy.js';

export interface HttpTransportOptions {
  maxRetries?: number;
  retryBaseDelayMs?: number;
  /** Replaces the network layer; every request goes through it. */
  adapter?: AxiosAdapter;
}

const DEFAULT_HEADERS = {
  Accept:
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
  'Accept-Encoding': 'gzip, deflate, br',
};

function toProxyConfig(proxy: string): AxiosProxyConfig {
  const parsed = new URL(proxy);
  const protocol = parsed.protocol.replace(/:$/, '');
  const defaultPort = protocol === 'https' ? 443 : 80;
  const port = parsed.port ? Number.parseInt(parsed.port, 10) : defaultPort;

  const proxyConfig: AxiosProxyConfig = { protocol, host: parsed.hostname, port };
  if (parsed.username) {
    proxyConfig.auth = {
      username: decodeURIComponent(parsed.username),
      password: decodeURIComponent(parsed.password),
    };
  }
  return proxyConfig;
}

function toBytes(data: unknown): Uint8Array | string {
  if (data instanceof Uint8Array) return data;
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  if (typeof data === 'string') return data;
  return new Uint8Array();
}

function flattenHeaders(response: AxiosResponse): Record<string, string> {
  const flat: Record<string, string> = {};
  const entries: [string, unknown][] = Object.entries(response.headers);
  for (const [name, value] of entries) {
    if (typeof value === 'string') flat[name.toLowerCase()] = value;
    else if (typeof value === 'number') flat[name.toLowerCase()] = String(value);
    else if (Array.isArray(value)) flat[name.toLowerCase()] = value.join(', ');
  }
  return flat;
}

/**
 * `Transport` over axios: one shared client, retries with backoff, and every
 * failure surfaced as `FetchError`.
 */
export class HttpTransport implements Transport {
  private readonly client: AxiosInstance;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;

  constructor(options: HttpTransportOptions = {}) {
    this.maxRetries = options.maxRetries ?? config.fetcher.maxRetries;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? RETRY.BASE_DELAY_MS;

    this.client = axios.create({
      maxRedirects: config.fetcher.maxRedirects,
      maxContentLength: SIZE_LIMITS.TEN_MB,
      responseType: 'arraybuffer',
      headers: DEFAULT_HEADERS,
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    this.client.interceptors.request.use(handleRequest);
    this.client.interceptors.response.use(handleResponse, handleResponseError);
  }

  async fetch(
    url: string,
    options: TransportRequestOptions
  ): Promise<TransportResponse> {
    const policy = new RetryPolicy(this.maxRetries, url, this.retryBaseDelayMs);
    return policy.execute(async () => this.request(url, options), options.signal);
  }

  private async request(
    url: string,
    options: TransportRequestOptions
  ): Promise<TransportResponse> {
    let finalUrl = url;
    const requestConfig: AxiosRequestConfig = {
      method: 'GET',
      url,
      timeout: options.timeoutMs,
      headers: { 'User-Agent': options.userAgent },
      beforeRedirect: (redirectOptions) => {
        const href: unknown = redirectOptions.href;
        if (typeof href === 'string') finalUrl = href;
      },
    };
    if (options.proxy) requestConfig.proxy = toProxyConfig(options.proxy);
    if (options.signal) requestConfig.signal = options.signal;

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.request<unknown>(requestConfig);
    } catch (error) {
      throw mapFetchError(error, url);
    }

    if (options.httpSuccessOnly ?? true) {
      assertSuccessStatus(response, url);
    }

    return {
      url: finalUrl,
      status: response.status,
      headers: flattenHeaders(response),
      body: toBytes(response.data),
    };
  }
}
