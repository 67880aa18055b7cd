/**
 * header-replay - JSON Serializer
 *
 * JSON text is written from ordered entry lists: a plain object would list
 * integer-like keys first and take "__proto__" as its prototype.
 */

import type {
  ParsedHeaders,
  SerializedEntry,
  SerializedHeaders,
  SerializeOptions,
  ValueFormat,
  ValuePair,
} from "./types";

type JsonNode = string | JsonEntry[];
type JsonEntry = [string, JsonNode];

export class HeaderSerializer {
  /**
   * request_line / headers / cookies with headers and cookies as ordered entries
   */
  static toEntries(
    parsed: ParsedHeaders,
    options?: SerializeOptions
  ): SerializedHeaders {
    const format = options?.format ?? "pair";
    return {
      request_line: parsed.requestLine,
      headers: this.entries(parsed.headers, format),
      cookies: this.entries(parsed.cookies, format),
    };
  }

  /**
   * Same layout and whitespace as JSON.stringify(value, null, indent)
   */
  static toJson(parsed: ParsedHeaders, options?: SerializeOptions): string {
    const serialized = this.toEntries(parsed, options);
    const root: JsonEntry[] = [
      ["request_line", serialized.request_line],
      ["headers", serialized.headers.map(toJsonEntry)],
      ["cookies", serialized.cookies.map(toJsonEntry)],
    ];

    const width = Math.min(10, Math.max(0, Math.floor(options?.indent ?? 0)));
    return writeNode(root, " ".repeat(width), 0);
  }

  private static entries(
    values: ReadonlyMap<string, ValuePair>,
    format: ValueFormat
  ): SerializedEntry[] {
    const out: SerializedEntry[] = [];
    for (const [name, pair] of values) {
      out.push([
        name,
        format === "compact" && pair.raw === pair.decoded
          ? pair.raw
          : { raw: pair.raw, decoded: pair.decoded },
      ]);
    }
    return out;
  }
}

function toJsonEntry([name, value]: SerializedEntry): JsonEntry {
  if (typeof value === "string") return [name, value];
  return [
    name,
    [
      ["raw", value.raw],
      ["decoded", value.decoded],
    ],
  ];
}

function writeNode(node: JsonNode, indent: string, depth: number): string {
  if (typeof node === "string") return JSON.stringify(node);
  if (node.length === 0) return "{}";

  const newline = indent ? "\n" : "";
  const colon = indent ? ": " : ":";
  const pad = indent.repeat(depth + 1);
  const members = node.map(
    ([name, value]) =>
      `${newline}${pad}${JSON.stringify(name)}${colon}${writeNode(value, indent, depth + 1)}`
  );
  return `{${members.join(",")}${newline}${indent.repeat(depth)}}`;
}
