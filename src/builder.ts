/**
 * header-replay - Request Builder
 * Fluent API for turning a parsed header block back into an outgoing request
 */

import { RequestError } from "./errors";
import { HeaderParser } from "./parser";
import type { FetchInit, ParsedHeaders, Scheme, ValuePair } from "./types";

/** Headers undici refuses on an outgoing request, plus content-length (no body is replayed) */
const DROPPED_HEADERS = new Set([
  "connection",
  "keep-alive",
  "transfer-encoding",
  "upgrade",
  "expect",
  "content-length",
]);

const UNSENDABLE = /[\r\n\0]|[^\x00-\xff]/;

export class RequestBuilder {
  private _method: string = "GET";
  private _path: string = "/";
  private _host: string = "";
  private _scheme: Scheme = "https";
  private _headers: Array<{ name: string; value: ValuePair }> = [];
  private _cookies: Array<{ name: string; value: ValuePair }> = [];

  /**
   * Seed method, path, host, headers and cookies from a parsed block
   */
  static fromParsed(parsed: ParsedHeaders): RequestBuilder {
    const builder = new RequestBuilder();
    const requestLine = HeaderParser.parseRequestLine(parsed.requestLine);
    builder.method(requestLine.method).path(requestLine.target);

    for (const [name, value] of parsed.headers) {
      builder.header(name, value);
    }
    for (const [name, value] of parsed.cookies) {
      builder.cookie(name, value);
    }
    return builder;
  }

  /**
   * Set HTTP method (GET, POST, PUT, DELETE, etc.)
   */
  method(m: string): this {
    this._method = m;
    return this;
  }

  /**
   * Set request path/URI
   */
  path(p: string): this {
    this._path = p;
    return this;
  }

  /**
   * Set host (overrides the Host header when building the URL)
   */
  host(h: string): this {
    this._host = h;
    return this;
  }

  /**
   * Set scheme (http or https)
   */
  scheme(s: Scheme): this {
    this._scheme = s;
    return this;
  }

  /**
   * Add a header; a plain string is used as both raw and decoded value
   */
  header(name: string, value: ValuePair | string): this {
    this._headers.push({ name, value: toPair(value) });
    return this;
  }

  cookie(name: string, value: ValuePair | string): this {
    this._cookies.push({ name, value: toPair(value) });
    return this;
  }

  /**
   * Build full URL: scheme://host/path
   */
  buildUrl(): string {
    if (/^https?:\/\//i.test(this._path)) {
      return this._path;
    }

    const host = this._host || this.getHostHeader();
    if (!host) {
      throw new RequestError("Cannot build request URL: no Host header");
    }

    const path = this._path.startsWith("/") ? this._path : `/${this._path}`;
    return `${this._scheme}://${host}${path}`;
  }

  /**
   * Outgoing headers with decoded values (Cookie not included)
   */
  buildHeaders(): Record<string, string> {
    const entries: Array<[string, string]> = [];

    for (const h of this._headers) {
      const name = h.name.toLowerCase();
      if (DROPPED_HEADERS.has(name) || name === "cookie") continue;
      entries.push([name, sendableValue(h.value)]);
    }

    // fromEntries defines own properties, so "__proto__" stays a header
    return Object.fromEntries(entries);
  }

  /**
   * Rebuild the Cookie header as "name=value; name=value"
   */
  buildCookieHeader(): string | undefined {
    if (this._cookies.length === 0) return undefined;
    return this._cookies
      .map((c) => `${c.name}=${sendableValue(c.value)}`)
      .join("; ");
  }

  /**
   * Build as fetch-compatible init (method + headers including Cookie)
   */
  buildFetchInit(): FetchInit {
    const headers = this.buildHeaders();
    const cookie = this.buildCookieHeader();
    if (cookie !== undefined) {
      headers["cookie"] = cookie;
    }

    return {
      method: this._method,
      headers,
    };
  }

  /**
   * Extract host from headers if set
   */
  private getHostHeader(): string | undefined {
    const hostHeader = this._headers.find(
      (h) => h.name.toLowerCase() === "host"
    );
    return hostHeader?.value.decoded.trim() || undefined;
  }
}

function toPair(value: ValuePair | string): ValuePair {
  return typeof value === "string" ? { raw: value, decoded: value } : value;
}

/**
 * Decoded value, or the raw one when the decoding cannot go on the wire
 */
function sendableValue(pair: ValuePair): string {
  return UNSENDABLE.test(pair.decoded) ? pair.raw : pair.decoded;
}
