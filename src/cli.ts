/**
 * header-replay - Command Line
 *
 * Usage: header-replay [file]
 *
 * Parses the header block in `file` (or the bundled sample), prints it as
 * JSON, replays it over HTTPS and prints the response status code.
 */

import { readFile } from "node:fs/promises";
import { RequestError, toError } from "./errors";
import { HeaderParser } from "./parser";
import { SAMPLE_HEADER_BLOCK } from "./sample";
import { RequestSender } from "./sender";
import { HeaderSerializer } from "./serializer";
import type { SenderOptions } from "./types";

/**
 * @returns the process exit code (0 on a status code, 1 on a request error)
 */
export async function runCli(
  args: string[],
  senderOptions?: SenderOptions
): Promise<number> {
  const [file] = args;
  const text = file ? await readFile(file, "utf-8") : SAMPLE_HEADER_BLOCK;

  const parsed = HeaderParser.parse(text);
  console.log(HeaderSerializer.toJson(parsed, { format: "compact", indent: 4 }));

  try {
    const status = await new RequestSender(senderOptions).send(parsed);
    console.log(`Status code: ${status}`);
    return 0;
  } catch (err: unknown) {
    const error = toError(err);
    if (error instanceof RequestError) {
      console.error(`Request error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
