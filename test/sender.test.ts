import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { MockAgent } from "undici";
import { RequestError } from "../src/errors";
import { HeaderParser } from "../src/parser";
import { RequestSender, sendRequest } from "../src/sender";

const BLOCK =
  "GET /\n" +
  "Host: www.website.com\n" +
  "User-Agent: replay-test\n" +
  "Cookie: sid=6%7C%7C123";

describe("RequestSender", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await agent.close();
  });

  test("returns the response status code", async () => {
    agent
      .get("https://www.website.com")
      .intercept({ path: "/", method: "GET" })
      .reply(200, "ok");

    const sender = new RequestSender({ dispatcher: agent, log: false });
    const status = await sender.send(HeaderParser.parse(BLOCK));

    expect(status).toBe(200);
    expect(status).toBeGreaterThanOrEqual(100);
    expect(status).toBeLessThanOrEqual(599);
  });

  test("forwards decoded headers and the rebuilt Cookie header", async () => {
    agent
      .get("https://www.website.com")
      .intercept({
        path: "/",
        method: "GET",
        headers: { cookie: "sid=6||123", "user-agent": "replay-test" },
      })
      .reply(404, "missing");

    const status = await sendRequest(HeaderParser.parse(BLOCK), "https", {
      dispatcher: agent,
      log: false,
    });

    expect(status).toBe(404);
  });

  test("honours the scheme", async () => {
    agent
      .get("http://www.website.com")
      .intercept({ path: "/", method: "GET" })
      .reply(418, "teapot");

    const status = await sendRequest(HeaderParser.parse(BLOCK), "http", {
      dispatcher: agent,
      log: false,
    });

    expect(status).toBe(418);
  });

  test("uses method and path from the request line", async () => {
    agent
      .get("https://api.example.com")
      .intercept({ path: "/items/7?force=1", method: "DELETE" })
      .reply(202, "");

    const parsed = HeaderParser.parse(
      "DELETE /items/7?force=1 HTTP/1.1\nHost: api.example.com"
    );
    const sender = new RequestSender({ dispatcher: agent, log: false });

    expect(await sender.send(parsed)).toBe(202);
  });

  test("raises RequestError when the host cannot be reached", async () => {
    const sender = new RequestSender({ dispatcher: agent, log: false });
    const result = sender.send(HeaderParser.parse(BLOCK));

    await expect(result).rejects.toBeInstanceOf(RequestError);
    await expect(result).rejects.toThrow(/^Request failed: fetch failed/);
  });

  test("raises RequestError without a Host header", async () => {
    const sender = new RequestSender({ dispatcher: agent, log: false });

    await expect(sender.send(HeaderParser.parse("GET /"))).rejects.toThrow(
      "Cannot build request URL: no Host header"
    );
  });

  describe("logging", () => {
    test("logs the request with the cookie masked and the status", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      agent
        .get("https://www.website.com")
        .intercept({ path: "/", method: "GET" })
        .reply(200, "ok");

      await new RequestSender({ dispatcher: agent }).send(
        HeaderParser.parse("GET /\nHost: www.website.com\nCookie: sid=1")
      );

      expect(log.mock.calls).toEqual([
        [
          '[REPLAY-req] GET https://www.website.com/ headers={"host":"www.website.com","cookie":"<masked>"}',
        ],
        ["[REPLAY-resp-SUCCESS] GET https://www.website.com/ status=200"],
      ]);
    });

    test("logs failures to stderr", async () => {
      vi.spyOn(console, "log").mockImplementation(() => {});
      const error = vi.spyOn(console, "error").mockImplementation(() => {});

      await expect(
        new RequestSender({ dispatcher: agent }).send(HeaderParser.parse(BLOCK))
      ).rejects.toBeInstanceOf(RequestError);

      expect(error).toHaveBeenCalledTimes(1);
      expect(error.mock.calls[0]?.[0]).toMatch(
        /^\[REPLAY-resp-FAIL\] GET https:\/\/www\.website\.com\/ errorType=RequestError error=Request failed: fetch failed/
      );
    });
  });
});
