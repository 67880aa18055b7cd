/**
 * header-replay - Percent-decoding Utilities
 */

import type { ValuePair } from "./types";

const PERCENT_ESCAPE = /%[0-9a-fA-F]{2}/;

export class Encoder {
  /**
   * Percent-decode a string (RFC 3986 §2.1).
   * Never throws: a malformed escape sequence leaves the whole string as-is.
   */
  static urlDecode(str: string): string {
    if (!this.hasEncodedSequence(str)) return str;
    try {
      return decodeURIComponent(str);
    } catch {
      return str;
    }
  }

  /**
   * Whether the string holds at least one %XX sequence
   */
  static hasEncodedSequence(str: string): boolean {
    return PERCENT_ESCAPE.test(str);
  }

  /**
   * Keep the raw value next to its decoding
   */
  static toValuePair(raw: string): ValuePair {
    return { raw, decoded: this.urlDecode(raw) };
  }
}
