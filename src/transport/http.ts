/**
 * HTTP primitives used by the REST transport.
 */

import { NetworkError } from "../error/index.js";

/**
 * HTTP request.
 */
export interface HttpRequest {
  method: "GET" | "POST" | "PUT" | "PATCH" | "DELETE";
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeout?: number;
}

/**
 * HTTP response.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Transport interface.
 */
export interface HttpTransport {
  /**
   * Send an HTTP request.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Check if response indicates success.
 */
export function isSuccess(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Get a header value (case-insensitive).
 */
export function getHeader(response: HttpResponse, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(response.headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Get request ID from response.
 */
export function getRequestId(response: HttpResponse): string | undefined {
  return getHeader(response, "x-goog-request-id");
}

/**
 * Parse a JSON response body; an empty body parses as `{}`.
 */
export function parseJsonBody(response: HttpResponse): unknown {
  const text = response.body.toString("utf-8");
  return text.length === 0 ? {} : JSON.parse(text);
}

/**
 * Fetch-based HTTP transport.
 */
export class FetchTransport implements HttpTransport {
  private readonly defaultTimeout: number;

  constructor(defaultTimeout: number = 30000) {
    this.defaultTimeout = defaultTimeout;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const timeout = request.timeout ?? this.defaultTimeout;

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(timeout),
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      const body = Buffer.from(await response.arrayBuffer());

      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        body,
      };
    } catch (error) {
      throw toNetworkError(error, timeout);
    }
  }
}

function toNetworkError(error: unknown, timeout: number): NetworkError {
  if (!(error instanceof Error)) {
    return new NetworkError(String(error), "ConnectionFailed");
  }
  if (error.name === "AbortError" || error.name === "TimeoutError") {
    return new NetworkError(`Request timeout after ${timeout}ms`, "Timeout");
  }
  const detail = error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
  if (detail.includes("ENOTFOUND") || detail.includes("EAI_AGAIN")) {
    return new NetworkError(`DNS resolution failed: ${detail}`, "DnsResolutionFailed");
  }
  if (detail.includes("CERT") || detail.includes("TLS") || detail.includes("SSL")) {
    return new NetworkError(`TLS error: ${detail}`, "TlsError");
  }
  return new NetworkError(`Connection failed: ${detail}`, "ConnectionFailed");
}
