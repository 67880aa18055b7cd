/**
 * header-replay - Type definitions
 */

import type { Dispatcher } from "undici";

// ============================================================================
// Parsed Header Block
// ============================================================================

/** A value as it appeared in the header block next to its percent-decoding */
export interface ValuePair {
  raw: string;
  decoded: string;
}

export interface ParsedHeaders {
  /** First line of the block, e.g. "GET / HTTP/1.1" ("" when absent) */
  readonly requestLine: string;
  /** Lowercased header name -> value, in input line order (Cookie excluded) */
  readonly headers: ReadonlyMap<string, ValuePair>;
  /** Cookie name -> value, in order of appearance in the Cookie header */
  readonly cookies: ReadonlyMap<string, ValuePair>;
}

export interface RequestLine {
  method: string;
  target: string;
  httpVersion?: string;
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * "pair" writes every entry as {raw, decoded}.
 * "compact" writes a bare string when nothing was decoded.
 */
export type ValueFormat = "pair" | "compact";

export interface SerializeOptions {
  format?: ValueFormat;
  /** Spaces per level, as JSON.stringify takes them */
  indent?: number;
}

export type SerializedValue = ValuePair | string;

/** Name and value, in the order they appeared in the block */
export type SerializedEntry = [name: string, value: SerializedValue];

export interface SerializedHeaders {
  request_line: string;
  headers: SerializedEntry[];
  cookies: SerializedEntry[];
}

// ============================================================================
// Sending
// ============================================================================

export type Scheme = "http" | "https";

export interface FetchInit {
  method: string;
  headers: Record<string, string>;
}

export interface FetchClientOptions {
  /** Timeout in milliseconds */
  defaultTimeout?: number;
  /** undici dispatcher (Agent, ProxyAgent, MockAgent) used for every request */
  dispatcher?: Dispatcher;
}

export interface FetchRequestOptions extends FetchInit {
  url: string;
  timeout?: number;
}

export interface FetchResponse {
  ok: boolean;
  status: number;
  headers: Map<string, string[]>;
  body: string;
}

export interface SenderOptions {
  /** Timeout in milliseconds (default: 30000) */
  timeout?: number;
  dispatcher?: Dispatcher;
  /** Log the request and its outcome (default: true) */
  log?: boolean;
}
