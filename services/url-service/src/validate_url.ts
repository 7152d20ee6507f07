export type Validation<T> = { ok: true; value: T } | { ok: false; error: string };

export function validateHttpUrl(s: string): Validation<URL> {
  if (!s.startsWith("http://") && !s.startsWith("https://")) {
    return { ok: false, error: "URL must start with http:// or https://" };
  }

  let parsed: URL;
  try {
    parsed = new URL(s);
  } catch {
    return { ok: false, error: "URL is not valid" };
  }

  return { ok: true, value: parsed };
}

/**
 * Validates a POST /shorten body and returns the URL exactly as submitted;
 * the stored long URL is never normalized.
 */
export function parseShortenBody(body: unknown, maxLength: number): Validation<string> {
  const url: unknown = typeof body === "object" && body !== null ? Reflect.get(body, "url") : undefined;
  if (url === undefined || url === null || url === "") {
    return { ok: false, error: "URL is required" };
  }
  if (typeof url !== "string") {
    return { ok: false, error: "URL must start with http:// or https://" };
  }
  if (url.length > maxLength) {
    return { ok: false, error: "URL is too long" };
  }

  const res = validateHttpUrl(url);
  if (!res.ok) return res;
  return { ok: true, value: url };
}
