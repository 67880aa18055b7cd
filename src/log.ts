/**
 * header-replay - Request Logging
 *
 * Logging format patterns:
 * - [REPLAY-req] METHOD url headers={...}
 * - [REPLAY-resp-SUCCESS] METHOD url status=200
 * - [REPLAY-resp-FAIL] METHOD url errorType=RequestError error=...
 */

import { toError } from "./errors";
import type { FetchInit } from "./types";

/** Header values that never reach the logs in clear */
const SECURE_HEADERS = new Set(["cookie", "authorization", "proxy-authorization"]);

export class LogRequestCall {
  /**
   * Run `method` with the request logged before and the outcome after.
   * Errors are logged and re-thrown unchanged.
   */
  async execute(
    url: string,
    init: FetchInit,
    method: () => Promise<number>
  ): Promise<number> {
    const target = `${init.method} ${url}`;
    console.log(
      `[REPLAY-req] ${target} headers=${JSON.stringify(LogRequestCall.maskHeaders(init.headers))}`
    );

    try {
      const status = await method();
      console.log(`[REPLAY-resp-SUCCESS] ${target} status=${status}`);
      return status;
    } catch (err: unknown) {
      const error = toError(err);
      console.error(
        `[REPLAY-resp-FAIL] ${target} errorType=${error.name} error=${error.message}`
      );
      throw error;
    }
  }

  static maskHeaders(headers: Record<string, string>): Record<string, string> {
    return Object.fromEntries(
      Object.entries(headers).map(([name, value]): [string, string] => [
        name,
        SECURE_HEADERS.has(name.toLowerCase()) ? "<masked>" : value,
      ])
    );
  }
}
