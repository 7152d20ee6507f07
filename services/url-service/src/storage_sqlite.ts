import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { DuplicateCodeError, StorageError } from "./errors.js";
import type { UrlRecord, UrlStore } from "./storage.js";

interface UrlRow {
  id: number;
  short_code: string;
  long_url: string;
  created_at: string;
}

const IN_MEMORY = ":memory:";

function toRecord(row: UrlRow): UrlRecord {
  return { id: row.id, shortCode: row.short_code, longUrl: row.long_url, createdAt: row.created_at };
}

function isUniqueViolation(e: unknown): boolean {
  return e instanceof Database.SqliteError && e.code === "SQLITE_CONSTRAINT_UNIQUE";
}

/**
 * better-sqlite3 is synchronous: each call is one short statement, and SQLite
 * serializes writers on its own lock (busy_timeout bounds the wait).
 */
export class SqliteUrlStore implements UrlStore {
  private readonly db: Database.Database;

  constructor(dbPath: string, opts: { busyTimeoutMs: number }) {
    if (dbPath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath, { fileMustExist: false });
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.pragma(`busy_timeout = ${opts.busyTimeoutMs}`);
  }

  async init(): Promise<void> {
    this.guard("init", () =>
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS urls (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          short_code TEXT UNIQUE NOT NULL,
          long_url TEXT NOT NULL,
          created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
        );
        CREATE INDEX IF NOT EXISTS urls_created_at_idx ON urls (created_at DESC);
      `)
    );
  }

  async ping(): Promise<void> {
    this.guard("ping", () => this.db.prepare("SELECT 1").get());
  }

  async exists(code: string): Promise<boolean> {
    const row = this.guard("exists", () =>
      this.db.prepare<[string], { id: number }>("SELECT id FROM urls WHERE short_code = ?").get(code)
    );
    return row !== undefined;
  }

  async insert(code: string, longUrl: string): Promise<UrlRecord> {
    let row: UrlRow | undefined;
    try {
      row = this.db
        .prepare<[string, string], UrlRow>(
          `INSERT INTO urls (short_code, long_url) VALUES (?, ?)
           RETURNING id, short_code, long_url, created_at`
        )
        .get(code, longUrl);
    } catch (e) {
      if (isUniqueViolation(e)) throw new DuplicateCodeError(code);
      throw new StorageError("insert failed", { cause: e });
    }
    if (!row) throw new StorageError("insert returned no row");
    return toRecord(row);
  }

  async lookup(code: string): Promise<string | null> {
    const row = this.guard("lookup", () =>
      this.db
        .prepare<[string], Pick<UrlRow, "long_url">>("SELECT long_url FROM urls WHERE short_code = ?")
        .get(code)
    );
    return row?.long_url ?? null;
  }

  async count(): Promise<number> {
    const row = this.guard("count", () =>
      this.db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM urls").get()
    );
    return row?.total ?? 0;
  }

  async recent(limit: number): Promise<UrlRecord[]> {
    const rows = this.guard("recent", () =>
      this.db
        .prepare<[number], UrlRow>(
          `SELECT id, short_code, long_url, created_at FROM urls
           ORDER BY created_at DESC, id DESC LIMIT ?`
        )
        .all(limit)
    );
    return rows.map(toRecord);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private guard<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      throw new StorageError(`${op} failed`, { cause: e });
    }
  }
}
