/**
 * @glstream/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - Request ID generation
 * - Timeout handling (up to response headers)
 * - Retry logic (exponential backoff for 5xx and network errors)
 * - Error normalization into GlClientError
 *
 * Design:
 * - Zero external dependencies (uses native fetch)
 * - Bodies come back as `unknown`; GlClient validates them
 * - Custom fetch function for testing
 */

import type { ApiResponse, GlClientConfig } from "./types.js";
import { GlClientError } from "./types.js";

const MAX_BACKOFF_MS = 10_000;

// =============================================================================
// Internal Helpers
// =============================================================================

/** Generate a simple request ID */
function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/** Sleep for the given number of milliseconds */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a response body as JSON, handling empty responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

/**
 * Extract selected headers from a Response.
 */
function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};

  for (const name of ["content-type", "x-request-id", "retry-after"]) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }

  return result;
}

interface ErrorFields {
  readonly code?: string | undefined;
  readonly message?: string | undefined;
  readonly details?: unknown;
}

/**
 * Read `{ error: { code, message, details } }` from an unknown body.
 */
function readErrorEnvelope(body: unknown): ErrorFields {
  if (body === null || typeof body !== "object" || !("error" in body)) {
    return {};
  }
  const error = body.error;
  if (error === null || typeof error !== "object") {
    return {};
  }
  return {
    code: "code" in error && typeof error.code === "string" ? error.code : undefined,
    message: "message" in error && typeof error.message === "string" ? error.message : undefined,
    details: "details" in error ? error.details : undefined,
  };
}

// =============================================================================
// HTTP Client
// =============================================================================

/**
 * Low-level HTTP client for the GL stream service.
 *
 * Provides GET for JSON endpoints with automatic retries, and a
 * streaming GET that hands back the open body.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(config: GlClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeout = config.timeout ?? 30000;
    this.maxRetries = config.retries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  /**
   * Perform a GET request and parse the JSON body.
   */
  async get(path: string): Promise<ApiResponse<unknown>> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      try {
        const response = await this.fetchWithTimeout(path, "application/json");
        const responseBody = await parseResponseBody(response);
        const responseHeaders = extractHeaders(response);

        // 2xx → success
        if (response.ok) {
          return { data: responseBody, status: response.status, headers: responseHeaders };
        }

        // 4xx → don't retry (client errors)
        if (response.status < 500) {
          throw this.toError(response.status, responseBody, "CLIENT_ERROR", `HTTP ${response.status}`);
        }

        // 5xx → retry with backoff
        if (attempt < this.maxRetries) {
          lastError = new GlClientError("SERVER_ERROR", `HTTP ${response.status}`, response.status);
          await sleep(this.backoff(attempt));
          continue;
        }

        // 5xx on last attempt
        throw this.toError(
          response.status,
          responseBody,
          "SERVER_ERROR",
          `HTTP ${response.status} after ${attempt + 1} attempts`,
        );
      } catch (error) {
        if (error instanceof GlClientError) {
          throw error;
        }

        // Network errors → retry
        if (attempt < this.maxRetries) {
          lastError = error instanceof Error ? error : new Error(String(error));
          await sleep(this.backoff(attempt));
          continue;
        }

        throw new GlClientError(
          "NETWORK_ERROR",
          lastError?.message ?? (error instanceof Error ? error.message : "Network error"),
          0,
        );
      }
    }

    throw new GlClientError(
      "NETWORK_ERROR",
      lastError?.message ?? "Request failed after all retries",
      0,
    );
  }

  /**
   * Open a streaming GET. Not retried: a stream is resumed by reconnecting.
   *
   * @returns The response body; cancel it (or abort `signal`) to disconnect
   */
  async openStream(path: string, signal?: AbortSignal): Promise<ReadableStream<Uint8Array>> {
    let response: Response;
    try {
      response = await this.fetchWithTimeout(path, "application/x-ndjson", signal);
    } catch (error) {
      if (error instanceof GlClientError) throw error;
      throw new GlClientError(
        "NETWORK_ERROR",
        error instanceof Error ? error.message : "Network error",
        0,
      );
    }

    if (!response.ok) {
      const body = await parseResponseBody(response);
      throw this.toError(response.status, body, "STREAM_ERROR", `HTTP ${response.status}`);
    }
    if (response.body === null) {
      throw new GlClientError("STREAM_ERROR", "Stream response has no body", response.status);
    }
    return response.body;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private backoff(attempt: number): number {
    return Math.min(this.retryDelayMs * Math.pow(2, attempt), MAX_BACKOFF_MS);
  }

  private toError(
    status: number,
    body: unknown,
    fallbackCode: string,
    fallbackMessage: string,
  ): GlClientError {
    const fields = readErrorEnvelope(body);
    return new GlClientError(
      fields.code ?? fallbackCode,
      fields.message ?? fallbackMessage,
      status,
      fields.details,
    );
  }

  /**
   * Fetch with a timeout using AbortController. The timer covers the
   * wait for response headers only; a caller signal stays linked after.
   */
  private async fetchWithTimeout(
    path: string,
    accept: string,
    signal?: AbortSignal,
  ): Promise<Response> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    const onAbort = (): void => controller.abort();
    if (signal?.aborted === true) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    try {
      return await this.fetchFn(`${this.baseUrl}${path}`, {
        method: "GET",
        headers: {
          Accept: accept,
          "X-Request-Id": generateRequestId(),
        },
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        throw new GlClientError(
          "TIMEOUT",
          `Request timed out after ${this.timeout}ms`,
          0,
        );
      }
      if (signal?.aborted === true) {
        throw new GlClientError("ABORTED", "Request aborted", 0);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
