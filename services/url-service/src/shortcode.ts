import { createHash } from "node:crypto";
import { customAlphabet } from "nanoid";

const ALPHANUMERIC = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";
const MIN_RANDOM_CHARS = 3;

const randomChars = customAlphabet(ALPHANUMERIC);

/** Produces a candidate code of exactly `length` characters. */
export type CodeGenerator = (url: string, attempt: number, length: number) => string;

/**
 * MD5 hex of the URL (with the attempt number appended on retries) followed by
 * random alphanumerics, truncated to `length`. The random tail is padded so the
 * result never comes up short, whatever the length.
 */
export const generateShortCode: CodeGenerator = (url, attempt, length) => {
  const input = attempt === 0 ? url : `${url}${attempt}`;
  const hex = createHash("md5").update(input).digest("hex");
  const tail = randomChars(Math.max(MIN_RANDOM_CHARS, length - hex.length));
  return (hex + tail).slice(0, length);
};
