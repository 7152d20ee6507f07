import type { Config } from "./config.js";
import type { UrlStore } from "./storage.js";
import { MemoryUrlStore } from "./storage_memory.js";
import { createPgClient, PostgresUrlStore } from "./storage_postgres.js";
import { SqliteUrlStore } from "./storage_sqlite.js";

export function buildStore(config: Config): UrlStore {
  switch (config.storageMode) {
    case "postgres": {
      if (!config.databaseUrl) throw new Error("STORAGE_MODE=postgres requires DATABASE_URL");
      return new PostgresUrlStore(createPgClient(config.databaseUrl, config.requestTimeoutMs));
    }
    case "memory":
      return new MemoryUrlStore();
    case "sqlite":
      return new SqliteUrlStore(config.dbPath, { busyTimeoutMs: config.requestTimeoutMs });
  }
}
