import { describe, expect, test } from "vitest";
import { parseShortenBody, validateHttpUrl } from "../../src/validate_url.js";

describe("validateHttpUrl", () => {
  test("accepts https", () => {
    const r = validateHttpUrl("https://example.com");
    expect(r.ok).toBe(true);
  });

  test("accepts http", () => {
    const r = validateHttpUrl("http://example.com/path?q=1");
    expect(r.ok).toBe(true);
  });

  test("rejects javascript scheme", () => {
    const r = validateHttpUrl("javascript:alert(1)");
    expect(r).toEqual({ ok: false, error: "URL must start with http:// or https://" });
  });

  test("rejects missing scheme", () => {
    const r = validateHttpUrl("www.example.com");
    expect(r.ok).toBe(false);
  });

  test("rejects a prefix with nothing parseable after it", () => {
    const r = validateHttpUrl("http://");
    expect(r).toEqual({ ok: false, error: "URL is not valid" });
  });
});

describe("parseShortenBody", () => {
  test("returns the url exactly as submitted", () => {
    const r = parseShortenBody({ url: "https://Example.com/A?b=1" }, 2048);
    expect(r).toEqual({ ok: true, value: "https://Example.com/A?b=1" });
  });

  test.each([undefined, null, "plain text", {}, { url: "" }, { url: null }])("requires url (%j)", (body) => {
    expect(parseShortenBody(body, 2048)).toEqual({ ok: false, error: "URL is required" });
  });

  test("rejects a non-string url", () => {
    expect(parseShortenBody({ url: 42 }, 2048)).toEqual({
      ok: false,
      error: "URL must start with http:// or https://"
    });
  });

  test("rejects ftp urls", () => {
    expect(parseShortenBody({ url: "ftp://example.com/file" }, 2048)).toEqual({
      ok: false,
      error: "URL must start with http:// or https://"
    });
  });

  test("rejects urls over the length limit", () => {
    const url = "https://example.com/" + "a".repeat(30);
    expect(parseShortenBody({ url }, 32)).toEqual({ ok: false, error: "URL is too long" });
  });
});
