import { setTimeout as sleep } from "node:timers/promises";
import { TransportError } from "./errors.js";

export type Fetch = typeof globalThis.fetch;

export interface HttpClientOptions {
  fetch?: Fetch;
  timeout: number;
  userAgent: string;
}

/**
 * Outbound HTTP with a per-request timeout. Network failures and timeouts
 * surface as `TransportError`; HTTP error statuses are returned as
 * responses for the caller to judge.
 */
export class HttpClient {
  private readonly fetchImpl: Fetch;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async request(url: string, init: RequestInit = {}): Promise<Response> {
    const headers = new Headers(init.headers);
    if (!headers.has("user-agent")) {
      headers.set("User-Agent", this.options.userAgent);
    }

    try {
      return await this.fetchImpl(url, {
        redirect: "follow",
        ...init,
        headers,
        signal: AbortSignal.timeout(this.options.timeout),
      });
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new TransportError(url, `Timed out after ${this.options.timeout}ms`, {
          cause: error,
        });
      }
      throw new TransportError(url, "Request failed", { cause: error });
    }
  }

  get(url: string, init: RequestInit = {}): Promise<Response> {
    return this.request(url, { ...init, method: "GET" });
  }

  head(url: string, init: RequestInit = {}): Promise<Response> {
    return this.request(url, { ...init, method: "HEAD" });
  }

  postForm(
    url: string,
    fields: Record<string, string>,
    init: RequestInit = {}
  ): Promise<Response> {
    return this.request(url, {
      ...init,
      method: "POST",
      headers: {
        ...Object.fromEntries(new Headers(init.headers)),
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: new URLSearchParams(fields).toString(),
    });
  }
}

export interface RetryOptions {
  attempts: number;
  backoff: number; // milliseconds, doubled after each failure
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Run `operation` up to `attempts` times with exponential backoff. Only
 * transport errors are retried unless `shouldRetry` says otherwise.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const shouldRetry =
    options.shouldRetry ?? ((error: unknown) => error instanceof TransportError);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= options.attempts || !shouldRetry(error)) {
        throw error;
      }
      options.onRetry?.(error, attempt);
      const delay = options.backoff * 2 ** (attempt - 1);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
}

/**
 * Read a response body as text. A body that breaks off mid-stream is a
 * transport failure like any other.
 */
export async function readBody(url: string, response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new TransportError(url, "Failed to read response body", { cause: error });
  }
}

export function contentTypeOf(response: Response): string {
  return (response.headers.get("content-type") ?? "")
    .split(";")[0]
    .trim()
    .toLowerCase();
}
