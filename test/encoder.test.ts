import { describe, expect, test } from "vitest";
import { Encoder } from "../src/encoder";

describe("Encoder", () => {
  describe("percent-decoding", () => {
    test("decodes escape sequences", () => {
      expect(Encoder.urlDecode("hello%20world")).toBe("hello world");
      expect(Encoder.urlDecode("6%7C%7C123")).toBe("6||123");
      expect(Encoder.urlDecode("caf%C3%A9")).toBe("café");
    });

    test("leaves values without escapes untouched", () => {
      for (const value of ["plain", "a+b", "text/html;q=0.9", ""]) {
        expect(Encoder.urlDecode(value)).toBe(value);
      }
    });

    test("is idempotent on values without escapes", () => {
      const value = "gzip, deflate, br";
      expect(Encoder.urlDecode(Encoder.urlDecode(value))).toBe(value);
    });

    test("returns the raw string on malformed escapes", () => {
      expect(Encoder.urlDecode("100%")).toBe("100%");
      expect(Encoder.urlDecode("%zz")).toBe("%zz");
      expect(Encoder.urlDecode("%E0%A4%A")).toBe("%E0%A4%A");
      expect(Encoder.urlDecode("ok%20then%C3")).toBe("ok%20then%C3");
    });
  });

  describe("hasEncodedSequence", () => {
    test("detects %XX only", () => {
      expect(Encoder.hasEncodedSequence("a%2Fb")).toBe(true);
      expect(Encoder.hasEncodedSequence("a%2fb")).toBe(true);
      expect(Encoder.hasEncodedSequence("50%")).toBe(false);
      expect(Encoder.hasEncodedSequence("%g1")).toBe(false);
    });
  });

  describe("toValuePair", () => {
    test("keeps raw next to decoded", () => {
      expect(Encoder.toValuePair("2%20x")).toEqual({
        raw: "2%20x",
        decoded: "2 x",
      });
      expect(Encoder.toValuePair("1")).toEqual({ raw: "1", decoded: "1" });
    });
  });
});
