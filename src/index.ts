/**
 * header-replay - Parse raw HTTP header blocks into raw/decoded pairs,
 * serialize them as JSON and replay them as a live request
 */

// =============================================================================
// Types
// =============================================================================

export type {
  ValuePair,
  ParsedHeaders,
  RequestLine,
  ValueFormat,
  SerializeOptions,
  SerializedValue,
  SerializedEntry,
  SerializedHeaders,
  Scheme,
  FetchInit,
  FetchClientOptions,
  FetchRequestOptions,
  FetchResponse,
  SenderOptions,
} from "./types";

// =============================================================================
// Core Classes
// =============================================================================

export { HeaderParser } from "./parser";
export { HeaderSerializer } from "./serializer";
export { RequestBuilder } from "./builder";
export { RequestSender, sendRequest } from "./sender";
export { FetchClient } from "./fetch";
export { LogRequestCall } from "./log";

// Utilities
export { Encoder } from "./encoder";
export { RequestError, toError } from "./errors";
export { SAMPLE_HEADER_BLOCK } from "./sample";
export { runCli } from "./cli";

// =============================================================================
// Convenience Exports
// =============================================================================

import { HeaderParser } from "./parser";
import { HeaderSerializer } from "./serializer";

/** Parse a raw header block */
export const parse = HeaderParser.parse.bind(HeaderParser);

/** Serialize a parsed header block as JSON */
export const toJson = HeaderSerializer.toJson.bind(HeaderSerializer);
