/**
 * header-replay - Request Sender
 * Replays a parsed header block as one live request and reports the status code
 */

import { RequestBuilder } from "./builder";
import { FetchClient } from "./fetch";
import { LogRequestCall } from "./log";
import type { ParsedHeaders, Scheme, SenderOptions } from "./types";

export class RequestSender {
  private client: FetchClient;
  private logRequestCall?: LogRequestCall;

  constructor(options?: SenderOptions) {
    this.client = new FetchClient({
      defaultTimeout: options?.timeout,
      dispatcher: options?.dispatcher,
    });
    if (options?.log ?? true) {
      this.logRequestCall = new LogRequestCall();
    }
  }

  /**
   * Send the parsed request (method from the request line, GET by default)
   * to scheme://<host><path> with its headers and rebuilt Cookie header.
   *
   * @returns the response status code
   * @throws RequestError when no status comes back (DNS, refused, timeout, no Host)
   */
  async send(parsed: ParsedHeaders, scheme: Scheme = "https"): Promise<number> {
    const builder = RequestBuilder.fromParsed(parsed).scheme(scheme);
    const url = builder.buildUrl();
    const init = builder.buildFetchInit();

    const method = async (): Promise<number> => {
      const response = await this.client.request({ url, ...init });
      return response.status;
    };

    if (!this.logRequestCall) {
      return method();
    }
    return this.logRequestCall.execute(url, init, method);
  }
}

/**
 * Convenience function for one-off sends
 */
export async function sendRequest(
  parsed: ParsedHeaders,
  scheme: Scheme = "https",
  options?: SenderOptions
): Promise<number> {
  return new RequestSender(options).send(parsed, scheme);
}
