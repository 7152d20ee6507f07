import pg from "pg";
import { DuplicateCodeError, StorageError } from "./errors.js";
import type { UrlRecord, UrlStore } from "./storage.js";

const { Pool } = pg;

// 23505 = unique_violation
const UNIQUE_VIOLATION = "23505";

export type QueryFn = (
  text: string,
  values?: unknown[]
) => Promise<{ rows: unknown[]; rowCount: number | null }>;

/** The slice of pg.Pool the store talks to. */
export interface PgClient {
  query: QueryFn;
  end(): Promise<void>;
}

export function createPgClient(databaseUrl: string, statementTimeoutMs: number): PgClient {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    statement_timeout: statementTimeoutMs
  });
  return {
    query: (text, values) => pool.query(text, values),
    end: () => pool.end()
  };
}

function isUniqueViolation(e: unknown): boolean {
  return typeof e === "object" && e !== null && "code" in e && e.code === UNIQUE_VIOLATION;
}

function field(row: unknown, key: string): unknown {
  return typeof row === "object" && row !== null ? Reflect.get(row, key) : undefined;
}

function toRecord(row: unknown): UrlRecord {
  const id = field(row, "id");
  const short_code = field(row, "short_code");
  const long_url = field(row, "long_url");
  const created_at = field(row, "created_at");
  if (typeof short_code !== "string" || typeof long_url !== "string" || !(created_at instanceof Date)) {
    throw new StorageError("unexpected row from urls");
  }
  return {
    id: Number(id),
    shortCode: short_code,
    longUrl: long_url,
    createdAt: created_at.toISOString()
  };
}

export class PostgresUrlStore implements UrlStore {
  constructor(private readonly client: PgClient) {}

  async init(): Promise<void> {
    await this.run("init", `
      CREATE TABLE IF NOT EXISTS urls (
        id SERIAL PRIMARY KEY,
        short_code TEXT UNIQUE NOT NULL,
        long_url TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT now()
      );
      CREATE INDEX IF NOT EXISTS urls_created_at_idx ON urls (created_at DESC);
    `);
  }

  async ping(): Promise<void> {
    await this.run("ping", "SELECT 1");
  }

  async exists(code: string): Promise<boolean> {
    const res = await this.run("exists", "SELECT 1 FROM urls WHERE short_code = $1", [code]);
    return (res.rowCount ?? 0) > 0;
  }

  async insert(code: string, longUrl: string): Promise<UrlRecord> {
    let res: Awaited<ReturnType<QueryFn>>;
    try {
      res = await this.client.query(
        `INSERT INTO urls (short_code, long_url) VALUES ($1, $2)
         RETURNING id, short_code, long_url, created_at`,
        [code, longUrl]
      );
    } catch (e) {
      if (isUniqueViolation(e)) throw new DuplicateCodeError(code);
      throw new StorageError("insert failed", { cause: e });
    }
    return toRecord(res.rows[0]);
  }

  async lookup(code: string): Promise<string | null> {
    const res = await this.run("lookup", "SELECT id, short_code, long_url, created_at FROM urls WHERE short_code = $1", [code]);
    if (res.rows.length === 0) return null;
    return toRecord(res.rows[0]).longUrl;
  }

  async count(): Promise<number> {
    const res = await this.run("count", "SELECT COUNT(*) AS total FROM urls");
    const n = Number(field(res.rows[0], "total"));
    if (!Number.isFinite(n)) throw new StorageError("unexpected count from urls");
    return n;
  }

  async recent(limit: number): Promise<UrlRecord[]> {
    const res = await this.run(
      "recent",
      `SELECT id, short_code, long_url, created_at FROM urls
       ORDER BY created_at DESC, id DESC LIMIT $1`,
      [limit]
    );
    return res.rows.map(toRecord);
  }

  async close(): Promise<void> {
    await this.client.end();
  }

  private async run(op: string, text: string, values?: unknown[]): ReturnType<QueryFn> {
    try {
      return await this.client.query(text, values);
    } catch (e) {
      throw new StorageError(`${op} failed`, { cause: e });
    }
  }
}
