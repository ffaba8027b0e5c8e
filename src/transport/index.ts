/**
 * HTTP Transport
 *
 * HTTP client interface and implementations for Graph and token requests.
 */

import { NetworkError } from "../errors";

/**
 * HTTP methods used by the client.
 */
export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/**
 * HTTP request definition.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: string | Uint8Array;
  timeout?: number;
}

/**
 * HTTP response definition. Header names are lower-cased.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: Uint8Array;
}

/**
 * HTTP transport interface (for dependency injection).
 */
export interface HttpTransport {
  /**
   * Send an HTTP request. Rejects with {@link NetworkError} only when no
   * response was received; every status code resolves.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Decode a response body as UTF-8 text.
 */
export function responseText(response: HttpResponse): string {
  return new TextDecoder().decode(response.body);
}

/**
 * Parse a response body as JSON. Returns undefined for an empty or non-JSON body.
 */
export function responseJson(response: HttpResponse): unknown {
  const text = responseText(response);
  if (text.trim() === "") {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

/**
 * Default fetch-based HTTP transport.
 */
export class FetchHttpTransport implements HttpTransport {
  private defaultTimeout: number;

  constructor(options?: { timeout?: number }) {
    this.defaultTimeout = options?.timeout ?? 300000;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const timeout = request.timeout ?? this.defaultTimeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const body = new Uint8Array(await response.arrayBuffer());

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        body,
      };
    } catch (error) {
      if (error instanceof Error) {
        if (error.name === "AbortError") {
          throw new NetworkError(
            `Request timeout after ${timeout}ms`,
            "Timeout",
            { cause: error }
          );
        }

        const detail = error.cause instanceof Error
          ? `${error.message}: ${error.cause.message}`
          : error.message;
        const message = detail.toLowerCase();
        if (message.includes("enotfound") || message.includes("dns")) {
          throw new NetworkError(
            `DNS resolution failed: ${detail}`,
            "DnsResolutionFailed",
            { cause: error }
          );
        }
        if (message.includes("certificate") || message.includes("ssl")) {
          throw new NetworkError(`TLS error: ${detail}`, "TlsError", { cause: error });
        }

        throw new NetworkError(`Connection failed: ${detail}`, "ConnectionFailed", {
          cause: error,
        });
      }

      throw new NetworkError(String(error), "ConnectionFailed");
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * A canned response, or a function computing one from the request.
 */
export type MockResponder =
  | HttpResponse
  | ((request: HttpRequest) => HttpResponse | Promise<HttpResponse>);

interface MockRoute {
  method: HttpMethod;
  url: string | RegExp;
  responder: MockResponder;
  remaining: number;
}

/**
 * Mock HTTP transport for testing.
 *
 * Routes are matched in registration order; a route registered with
 * `times` is consumed after that many matches. A request matching no route
 * is rejected.
 */
export class MockHttpTransport implements HttpTransport {
  private routes: MockRoute[] = [];
  private requestHistory: HttpRequest[] = [];

  /**
   * Answer requests matching method and URL (exact string or pattern).
   */
  route(
    method: HttpMethod,
    url: string | RegExp,
    responder: MockResponder,
    times: number = Infinity
  ): this {
    this.routes.push({ method, url, responder, remaining: times });
    return this;
  }

  getRequests(): HttpRequest[] {
    return [...this.requestHistory];
  }

  /**
   * Requests whose method matches and whose URL contains the fragment.
   */
  getRequestsTo(method: HttpMethod, urlFragment: string): HttpRequest[] {
    return this.requestHistory.filter(
      (r) => r.method === method && r.url.includes(urlFragment)
    );
  }

  getLastRequest(): HttpRequest | undefined {
    return this.requestHistory[this.requestHistory.length - 1];
  }

  clearHistory(): void {
    this.requestHistory = [];
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requestHistory.push(request);

    const route = this.routes.find(
      (r) =>
        r.remaining > 0 &&
        r.method === request.method &&
        (typeof r.url === "string" ? r.url === request.url : r.url.test(request.url))
    );
    if (route) {
      route.remaining--;
      return typeof route.responder === "function"
        ? route.responder(request)
        : route.responder;
    }

    throw new Error(`No mock response available for ${request.method} ${request.url}`);
  }
}

/**
 * Build a JSON response.
 */
export function jsonResponse(status: number, body: unknown): HttpResponse {
  return {
    status,
    statusText: status >= 200 && status < 300 ? "OK" : "Error",
    headers: { "content-type": "application/json" },
    body: new TextEncoder().encode(JSON.stringify(body)),
  };
}

/**
 * Build a binary response.
 */
export function bytesResponse(status: number, body: Uint8Array | string): HttpResponse {
  return {
    status,
    statusText: status >= 200 && status < 300 ? "OK" : "Error",
    headers: { "content-type": "application/octet-stream" },
    body: typeof body === "string" ? new TextEncoder().encode(body) : body,
  };
}

/**
 * Create production HTTP transport.
 */
export function createTransport(timeout?: number): HttpTransport {
  return new FetchHttpTransport({ timeout });
}
