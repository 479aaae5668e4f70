/**
 * Bearer-token HTTP client for the cloud API
 *
 * Wraps fetch with base URL resolution, default headers, a per-request
 * timeout, error mapping by status code and debug logging with the token
 * redacted.
 */

import {
  ApiError,
  BadRequestError,
  ConflictError,
  ForbiddenError,
  InternalServerError,
  LockedError,
  MalformedResponseError,
  NetworkError,
  NotFoundError,
  TooManyRequestsError,
  UnauthorizedError,
  UnexpectedResponseError,
  type ApiErrorDetails,
} from "./errors.js";
import { Logger, REDACTED, logger as defaultLogger } from "./observability/logs.js";
import { MetricsCollector, metrics as defaultMetrics, normalizeRoute } from "./observability/metrics.js";
import type { FetchLike, HttpClientOptions, HttpMethod, QueryValue, RequestOptions } from "./types.js";
import { SDK_VERSION } from "./version.js";

export const DEFAULT_BASE_URL = "https://api.timeweb.cloud";
export const DEFAULT_TIMEOUT_MS = 100_000;

type ApiErrorClass = new (details: ApiErrorDetails, options?: ErrorOptions) => ApiError;

const ERRORS_BY_STATUS: Record<number, ApiErrorClass> = {
  400: BadRequestError,
  403: ForbiddenError,
  404: NotFoundError,
  409: ConflictError,
  423: LockedError,
  429: TooManyRequestsError,
  500: InternalServerError,
};

export class HttpClient {
  readonly baseUrl: string;
  readonly #token: string;
  readonly #userAgent: string;
  readonly #timeoutMs: number;
  readonly #fetch: FetchLike;
  readonly #logger: Logger;
  readonly #metrics: MetricsCollector;

  constructor(options: HttpClientOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.#token = options.token;
    this.#userAgent = options.userAgent ?? `cirrus-sdk/${SDK_VERSION} node/${process.versions.node}`;
    this.#timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.#fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.#logger = options.logger ?? defaultLogger;
    this.#metrics = options.metrics ?? defaultMetrics;
    this.#logger.addSecret(this.#token);
  }

  /**
   * GET a JSON document. An empty body is a malformed response here.
   */
  async get<T = unknown>(path: string, options?: Omit<RequestOptions, "body">): Promise<T> {
    const data = await this.request<T>("GET", path, options);
    if (data === undefined) {
      throw new MalformedResponseError({ status: 204, method: "GET", url: this.resolveUrl(path), message: "Response has no body" });
    }
    return data;
  }

  /**
   * GET a non-JSON body as text
   */
  async getText(path: string, options?: Omit<RequestOptions, "body">): Promise<string> {
    const { text } = await this.send("GET", path, options ?? {}, "*/*");
    return text;
  }

  post<T = unknown>(path: string, options?: RequestOptions): Promise<T | undefined> {
    return this.request<T>("POST", path, options);
  }

  put<T = unknown>(path: string, options?: RequestOptions): Promise<T | undefined> {
    return this.request<T>("PUT", path, options);
  }

  patch<T = unknown>(path: string, options?: RequestOptions): Promise<T | undefined> {
    return this.request<T>("PATCH", path, options);
  }

  delete<T = unknown>(path: string, options?: RequestOptions): Promise<T | undefined> {
    return this.request<T>("DELETE", path, options);
  }

  /**
   * Perform a request and return the parsed JSON body, or `undefined` for
   * 204 and empty bodies
   */
  async request<T = unknown>(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<T | undefined> {
    const { status, statusText, url, text } = await this.send(method, path, options, "application/json");
    if (status === 204 || text.length === 0) {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new MalformedResponseError(
        { status, statusText, method, url, message: "Response body is not valid JSON" },
        { cause: err }
      );
    }
  }

  private async send(
    method: HttpMethod,
    path: string,
    options: RequestOptions,
    accept: string
  ): Promise<{ status: number; statusText: string; url: string; text: string }> {
    const url = this.resolveUrl(path, options.query);
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.#token}`,
      "User-Agent": this.#userAgent,
      Accept: accept,
    };
    let body: string | undefined;
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify(options.body);
    }

    this.#logger.debug("http.request", {
      method,
      path: url,
      details: { headers: { ...headers, Authorization: `Bearer ${REDACTED}` }, body: options.body },
    });

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.#timeoutMs);
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const route = normalizeRoute(path);
    const started = performance.now();
    let response: Response;
    let text: string;
    try {
      response = await this.#fetch(url, { method, headers, body, signal: controller.signal });
      text = await response.text();
    } catch (err) {
      this.#metrics.recordRequest(method, route, 0, performance.now() - started);
      const cause = timedOut ? new Error(`timed out after ${this.#timeoutMs} ms`, { cause: err }) : err;
      throw new NetworkError(method, url, { cause });
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", onAbort);
    }

    this.#metrics.recordRequest(method, route, response.status, performance.now() - started);
    this.#logger.debug("http.response", {
      method,
      path: url,
      message: `${response.status} ${response.statusText}`.trim(),
      details: { body: text.length > 0 ? text : "<no body>" },
    });

    if (!response.ok) {
      throw this.toApiError(method, url, response, text);
    }
    return { status: response.status, statusText: response.statusText, url, text };
  }

  resolveUrl(path: string, query?: Record<string, QueryValue>): string {
    const url = new URL(path.startsWith("/") ? `${this.baseUrl}${path}` : `${this.baseUrl}/${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value === undefined) continue;
      if (Array.isArray(value)) {
        for (const item of value) url.searchParams.append(key, String(item));
      } else {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  private toApiError(method: string, url: string, response: Response, text: string): ApiError {
    const base: ApiErrorDetails = {
      status: response.status,
      statusText: response.statusText,
      method,
      url,
    };

    // 401 responses come without a body
    if (response.status === 401) {
      return new UnauthorizedError({ ...base, message: "Unauthorized: check your API token" });
    }

    const parsed = parseErrorBody(text);
    if (!parsed) {
      return new MalformedResponseError({
        ...base,
        message: `HTTP ${response.status}: response has no JSON error document`,
      });
    }

    const details: ApiErrorDetails = { ...base, ...parsed };
    const ErrorClass = ERRORS_BY_STATUS[response.status] ?? UnexpectedResponseError;
    return new ErrorClass(details);
  }
}

/**
 * Parse `{ status_code, error_code, message, response_id }`
 */
function parseErrorBody(text: string): Pick<ApiErrorDetails, "errorCode" | "message" | "responseId"> | undefined {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return undefined;
  }

  const errorCode = "error_code" in data && typeof data.error_code === "string" ? data.error_code : undefined;
  const responseId = "response_id" in data && typeof data.response_id === "string" ? data.response_id : undefined;
  let message: string | string[] | undefined;
  if ("message" in data) {
    if (typeof data.message === "string") {
      message = data.message;
    } else if (Array.isArray(data.message)) {
      message = data.message.map((m: unknown) => String(m));
    }
  }

  if (errorCode === undefined && message === undefined) {
    return undefined;
  }
  return { errorCode, message, responseId };
}
