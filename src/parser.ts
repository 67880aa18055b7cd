/**
 * header-replay - Header Block Parser
 */

import { Encoder } from "./encoder";
import type { ParsedHeaders, RequestLine, ValuePair } from "./types";

const HTTP_VERSION = /^HTTP\/\d+(\.\d+)?$/i;
const REQUEST_LINE = /^[A-Za-z]+\s+[^\s:]\S*(\s+HTTP\/\d+(\.\d+)?)?$/i;

// ============================================================================
// Header Parser
// ============================================================================

export class HeaderParser {
  /**
   * Parse a raw header block (request line + "Name: Value" lines).
   * Never fails: lines without a colon and cookie segments without "=" are skipped.
   */
  static parse(text: string): ParsedHeaders {
    const lines = text.split(/\r\n|\n|\r/);
    const headers = new Map<string, ValuePair>();
    const cookies = new Map<string, ValuePair>();

    let requestLine = "";
    let start = lines.findIndex((line) => line.trim() !== "");
    if (start === -1) start = lines.length;

    // A block that opens straight on a header has no request line
    const first = lines[start];
    if (
      first !== undefined &&
      (!first.includes(":") || REQUEST_LINE.test(first.trim()))
    ) {
      requestLine = first.trim();
      start++;
    }

    for (let i = start; i < lines.length; i++) {
      const line = lines[i];
      if (!line) continue;

      const colonIndex = line.indexOf(":");
      if (colonIndex === -1) continue;

      const name = line.substring(0, colonIndex).trim().toLowerCase();
      const value = line.substring(colonIndex + 1).trim();
      if (!name) continue;

      if (name === "cookie") {
        for (const [cookieName, pair] of this.parseCookieHeader(value)) {
          cookies.set(cookieName, pair);
        }
      } else {
        headers.set(name, Encoder.toValuePair(value));
      }
    }

    return Object.freeze({ requestLine, headers, cookies });
  }

  /**
   * Split a Cookie header value into name -> ValuePair, keeping order
   */
  static parseCookieHeader(value: string): Map<string, ValuePair> {
    const cookies = new Map<string, ValuePair>();

    for (const segment of value.split(";")) {
      const trimmed = segment.trim();
      if (!trimmed) continue;

      const eqIndex = trimmed.indexOf("=");
      if (eqIndex === -1) continue;

      const name = trimmed.substring(0, eqIndex).trim();
      const cookieValue = trimmed.substring(eqIndex + 1).trim();
      if (!name) continue;

      cookies.set(name, Encoder.toValuePair(cookieValue));
    }

    return cookies;
  }

  /**
   * Split "METHOD target [HTTP/x.y]"
   */
  static parseRequestLine(line: string): RequestLine {
    const [method, target, version] = line.trim().split(/\s+/);
    const requestLine: RequestLine = {
      method: method ? method.toUpperCase() : "GET",
      target: target || "/",
    };

    if (version && HTTP_VERSION.test(version)) {
      requestLine.httpVersion = version.substring(5);
    }

    return requestLine;
  }
}
