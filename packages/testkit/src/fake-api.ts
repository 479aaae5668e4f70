/**
 * In-process stand-in for the cloud API
 *
 * Pass `api.fetch` to `createClient({ fetch })`; every request is matched
 * against the registered routes and recorded for assertions.
 */

import type { FetchLike } from "@cirrus/sdk";

export interface FakeRequest {
  method: string;
  path: string;
  params: Record<string, string>;
  query: URLSearchParams;
  headers: Record<string, string>;
  body: unknown;
}

export interface FakeResponse {
  status?: number;
  /** Serialized as JSON */
  body?: unknown;
  /** Sent as-is; takes precedence over `body` */
  text?: string;
}

export type FakeHandler = (request: FakeRequest) => FakeResponse | Promise<FakeResponse>;

interface Route {
  method: string;
  pattern: RegExp;
  names: string[];
  handler: FakeHandler;
}

/**
 * Error body in the API's format
 */
export function apiError(status: number, errorCode: string, message: string | string[]): FakeResponse {
  return {
    status,
    body: { status_code: status, error_code: errorCode, message, response_id: `test-${status}` },
  };
}

/**
 * Handler returning `responses` in order, repeating the last one
 */
export function sequence(...responses: FakeResponse[]): FakeHandler {
  let index = 0;
  return () => {
    const response = responses[Math.min(index, responses.length - 1)] ?? { status: 204 };
    index++;
    return response;
  };
}

export class FakeApi {
  readonly requests: FakeRequest[] = [];
  #routes: Route[] = [];

  /**
   * Register a route. `path` may contain `:name` segments.
   */
  on(method: string, path: string, handler: FakeHandler | FakeResponse): this {
    const names: string[] = [];
    const source = path
      .split("/")
      .map((segment) => {
        if (segment.startsWith(":")) {
          names.push(segment.slice(1));
          return "([^/]+)";
        }
        return segment.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
      })
      .join("/");
    this.#routes.push({
      method: method.toUpperCase(),
      pattern: new RegExp(`^${source}$`),
      names,
      handler: typeof handler === "function" ? handler : () => handler,
    });
    return this;
  }

  /**
   * Requests matching `method` and `path` exactly, in arrival order
   */
  calls(method: string, path: string): FakeRequest[] {
    return this.requests.filter((r) => r.method === method.toUpperCase() && r.path === path);
  }

  reset(): void {
    this.requests.length = 0;
    this.#routes = [];
  }

  readonly fetch: FetchLike = async (input, init) => {
    const url = new URL(input);
    const method = (init.method ?? "GET").toUpperCase();
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const body: unknown = typeof init.body === "string" ? JSON.parse(init.body) : undefined;

    const request: FakeRequest = {
      method,
      path: url.pathname,
      params: {},
      query: url.searchParams,
      headers,
      body,
    };
    this.requests.push(request);

    for (const route of this.#routes) {
      if (route.method !== method) continue;
      const match = route.pattern.exec(url.pathname);
      if (!match) continue;
      route.names.forEach((name, i) => {
        request.params[name] = decodeURIComponent(match[i + 1] ?? "");
      });
      return toResponse(await route.handler(request));
    }

    return toResponse(apiError(404, "not_found", `No fake route for ${method} ${url.pathname}`));
  };
}

function toResponse(fake: FakeResponse): Response {
  const status = fake.status ?? 200;
  if (status === 204) {
    return new Response(null, { status });
  }
  if (fake.text !== undefined) {
    return new Response(fake.text, { status });
  }
  if (fake.body === undefined) {
    return new Response(null, { status });
  }
  return new Response(JSON.stringify(fake.body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}
