import type { HttpFetcher, HttpResponse } from '../../src/config/httpClient.js';

export type Route = HttpResponse | ((call: number) => HttpResponse | Promise<HttpResponse>);

export function htmlResponse(body: string, status: number = 200): HttpResponse {
  return { status, headers: { 'content-type': 'text/html; charset=utf-8' }, body };
}

export function jsonResponse(data: unknown, status: number = 200, headers: Record<string, string> = {}): HttpResponse {
  return { status, headers: { 'content-type': 'application/json', ...headers }, body: JSON.stringify(data) };
}

/**
 * In-process HttpFetcher: answers registered URLs, 404 for everything else
 */
export class FakeFetcher implements HttpFetcher {
  readonly requests: { url: string; headers: Record<string, string> }[] = [];
  private readonly routes = new Map<string, Route>();
  private readonly calls = new Map<string, number>();

  on(url: string, route: Route): this {
    this.routes.set(url, route);
    return this;
  }

  urls(): string[] {
    return this.requests.map(request => request.url);
  }

  async get(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    this.requests.push({ url, headers });
    const call = (this.calls.get(url) ?? 0) + 1;
    this.calls.set(url, call);

    const route = this.routes.get(url);
    if (!route) {
      return { status: 404, headers: {}, body: 'Not Found' };
    }
    return typeof route === 'function' ? route(call) : route;
  }
}
