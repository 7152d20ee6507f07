export type StorageMode = "sqlite" | "postgres" | "memory";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface Config {
  port: number;
  host: string;
  baseUrl: string;
  storageMode: StorageMode;
  dbPath: string;
  databaseUrl?: string;
  logLevel: LogLevel;
  bodyLimitBytes: number;
  requestTimeoutMs: number;
  codeLength: number;
  maxAttempts: number;
  maxUrlLength: number;
  indexHtmlPath: string;
  version: string;
}

type Env = Record<string, string | undefined>;

const STORAGE_MODES: readonly StorageMode[] = ["sqlite", "postgres", "memory"];
const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function mustBeUrl(s: string): string {
  try {
    const u = new URL(s);
    if (u.protocol !== "http:" && u.protocol !== "https:") throw new Error("bad protocol");
    return s.replace(/\/+$/, "");
  } catch {
    throw new Error(`Invalid BASE_URL: ${s}`);
  }
}

function intInRange(name: string, raw: string, min: number, max: number): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new Error(`Invalid ${name}: ${raw}`);
  }
  return n;
}

function oneOf<T extends string>(name: string, raw: string, allowed: readonly T[]): T {
  const found = allowed.find((v) => v === raw);
  if (found === undefined) throw new Error(`Invalid ${name}: ${raw}`);
  return found;
}

export function loadConfig(env: Env = process.env): Config {
  const port = intInRange("PORT", env.PORT ?? "5000", 1, 65535);
  const host = env.HOST ?? "0.0.0.0";
  const baseUrl = mustBeUrl(env.BASE_URL ?? "http://localhost:5000");

  const databaseUrl = env.DATABASE_URL;
  const storageMode = env.STORAGE_MODE
    ? oneOf("STORAGE_MODE", env.STORAGE_MODE, STORAGE_MODES)
    : databaseUrl
      ? "postgres"
      : "sqlite";

  if (storageMode === "postgres" && !databaseUrl) {
    throw new Error("STORAGE_MODE=postgres requires DATABASE_URL");
  }

  return {
    port,
    host,
    baseUrl,
    storageMode,
    dbPath: env.DB_PATH ?? "data/urls.db",
    databaseUrl,
    logLevel: oneOf("LOG_LEVEL", env.LOG_LEVEL ?? "info", LOG_LEVELS),
    bodyLimitBytes: intInRange("BODY_LIMIT_BYTES", env.BODY_LIMIT_BYTES ?? String(1024 * 16), 1, 1024 * 1024),
    requestTimeoutMs: intInRange("REQUEST_TIMEOUT_MS", env.REQUEST_TIMEOUT_MS ?? "10000", 1, 300_000),
    codeLength: intInRange("CODE_LENGTH", env.CODE_LENGTH ?? "6", 4, 64),
    maxAttempts: intInRange("MAX_ATTEMPTS", env.MAX_ATTEMPTS ?? "5", 1, 100),
    maxUrlLength: intInRange("MAX_URL_LENGTH", env.MAX_URL_LENGTH ?? "2048", 16, 65536),
    indexHtmlPath: env.INDEX_HTML_PATH ?? "public/index.html",
    version: env.APP_VERSION ?? "1.0.0"
  };
}
