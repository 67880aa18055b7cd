/**
 * header-replay - Fetch Wrapper
 * Thin client over undici's fetch with a timeout and an injectable dispatcher
 */

import { fetch, type Dispatcher, type RequestInit } from "undici";
import { RequestError, toError } from "./errors";
import type {
  FetchClientOptions,
  FetchRequestOptions,
  FetchResponse,
} from "./types";

export class FetchClient {
  private defaultTimeout: number;
  private dispatcher?: Dispatcher;

  constructor(options?: FetchClientOptions) {
    this.defaultTimeout = options?.defaultTimeout ?? 30000;
    this.dispatcher = options?.dispatcher;
  }

  /**
   * Send one request. Anything that keeps a status code from coming back
   * (DNS, refused connection, timeout) is thrown as a RequestError.
   */
  async request(options: FetchRequestOptions): Promise<FetchResponse> {
    const { url, method, headers, timeout = this.defaultTimeout } = options;

    // Create abort controller for timeout
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    const fetchOptions: RequestInit = {
      method,
      headers,
      signal: controller.signal,
    };
    if (this.dispatcher) {
      fetchOptions.dispatcher = this.dispatcher;
    }

    try {
      const response = await fetch(url, fetchOptions);
      const body = await response.text();

      // Convert headers to Map<string, string[]>
      const headersMap = new Map<string, string[]>();
      response.headers.forEach((value, key) => {
        const existing = headersMap.get(key.toLowerCase());
        if (existing) {
          existing.push(value);
        } else {
          headersMap.set(key.toLowerCase(), [value]);
        }
      });

      return {
        ok: response.ok,
        status: response.status,
        headers: headersMap,
        body,
      };
    } catch (err: unknown) {
      const error = toError(err);
      if (error.name === "AbortError") {
        throw new RequestError(`Request timeout after ${timeout}ms`, url, error);
      }
      throw new RequestError(
        `Request failed: ${describeCause(error)}`,
        url,
        error
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * undici reports network failures as TypeError("fetch failed") with the
 * real reason (ENOTFOUND, ECONNREFUSED, ...) in `cause`
 */
function describeCause(error: Error): string {
  if (error.cause !== undefined) {
    const cause = toError(error.cause);
    const code =
      "code" in cause && typeof cause.code === "string" ? ` (${cause.code})` : "";
    return `${error.message}: ${cause.message}${code}`;
  }
  return error.message;
}
