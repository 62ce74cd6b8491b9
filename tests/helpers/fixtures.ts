import { readFileSync } from 'node:fs';

import type {
  Transport,
  TransportRequestOptions,
  TransportResponse,
} from '../../src/config/types.js';
import { FetchError } from '../../src/errors/app-error.js';

export const STORM_URL =
  'http://www.cnn.com/2013/11/27/travel/weather-thanksgiving/index.html?iref=allsearch';

export function loadFixture(name: string): string {
  return readFileSync(new URL(`../fixtures/${name}`, import.meta.url), 'utf8');
}

export function htmlResponse(
  url: string,
  html: string,
  contentType = 'text/html; charset=utf-8'
): TransportResponse {
  return {
    url,
    status: 200,
    headers: { 'content-type': contentType },
    body: new Uint8Array(Buffer.from(html, 'utf8')),
  };
}

type Route = string | TransportResponse | Error;

/**
 * In-memory `Transport` serving canned pages by exact URL. Unknown URLs
 * fail the way a 404 does.
 */
export class FakeTransport implements Transport {
  readonly requests: { url: string; options: TransportRequestOptions }[] = [];
  private readonly routes = new Map<string, Route>();

  constructor(routes: Record<string, Route> = {}) {
    for (const [url, route] of Object.entries(routes)) {
      this.routes.set(url, route);
    }
  }

  route(url: string, route: Route): this {
    this.routes.set(url, route);
    return this;
  }

  requestedUrls(): string[] {
    return this.requests.map(({ url }) => url);
  }

  async fetch(
    url: string,
    options: TransportRequestOptions
  ): Promise<TransportResponse> {
    this.requests.push({ url, options });
    const route = this.routes.get(url);
    if (route === undefined) {
      throw new FetchError('HTTP 404: Not Found', url, 404);
    }
    if (route instanceof Error) throw route;
    return typeof route === 'string' ? htmlResponse(url, route) : route;
  }
}
