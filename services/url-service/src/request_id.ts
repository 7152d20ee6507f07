import type { IncomingHttpHeaders } from "node:http";
import { randomUUID } from "node:crypto";

export const REQUEST_ID_HEADER = "x-request-id";
const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Incoming X-Request-Id if usable (first value, trimmed, 1..128 chars),
 * otherwise a fresh UUID.
 */
export function getOrCreateRequestId(headers: IncomingHttpHeaders): string {
  const raw = headers[REQUEST_ID_HEADER];
  const incoming = Array.isArray(raw) ? raw[0] : raw;

  const trimmed = (incoming ?? "").trim();
  if (trimmed.length > 0 && trimmed.length <= MAX_REQUEST_ID_LENGTH) {
    return trimmed;
  }

  return randomUUID();
}
