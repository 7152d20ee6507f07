import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DuplicateCodeError } from "../../src/errors.js";
import type { UrlStore } from "../../src/storage.js";
import { MemoryUrlStore } from "../../src/storage_memory.js";
import { SqliteUrlStore } from "../../src/storage_sqlite.js";

const backends: Array<[string, () => UrlStore]> = [
  ["memory", () => new MemoryUrlStore()],
  ["sqlite", () => new SqliteUrlStore(":memory:", { busyTimeoutMs: 1000 })]
];

describe.each(backends)("%s store", (_name, make) => {
  let store: UrlStore;

  beforeEach(async () => {
    store = make();
    await store.init();
  });

  afterEach(async () => {
    await store.close();
  });

  it("looks up exactly what was inserted", async () => {
    const url = "https://example.com/path?q=a%20b&x=1#frag";
    await store.insert("abc123", url);
    expect(await store.lookup("abc123")).toBe(url);
  });

  it("returns null for unknown codes", async () => {
    expect(await store.lookup("nope00")).toBeNull();
  });

  it("reports existence", async () => {
    await store.insert("abc123", "https://example.com");
    expect(await store.exists("abc123")).toBe(true);
    expect(await store.exists("ABC123")).toBe(false);
  });

  it("assigns increasing ids and an ISO timestamp", async () => {
    const a = await store.insert("aaaaaa", "https://example.com/a");
    const b = await store.insert("bbbbbb", "https://example.com/b");
    expect(b.id).toBeGreaterThan(a.id);
    expect(a.createdAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it("rejects a duplicate code and keeps the original", async () => {
    await store.insert("abc123", "https://example.com/first");
    await expect(store.insert("abc123", "https://example.com/second")).rejects.toBeInstanceOf(
      DuplicateCodeError
    );
    expect(await store.lookup("abc123")).toBe("https://example.com/first");
    expect(await store.count()).toBe(1);
  });

  it("counts records", async () => {
    expect(await store.count()).toBe(0);
    await store.insert("aaaaaa", "https://example.com/a");
    await store.insert("bbbbbb", "https://example.com/b");
    expect(await store.count()).toBe(2);
  });

  it("lists the newest records first, capped", async () => {
    for (let i = 0; i < 12; i++) {
      await store.insert(`code${String(i).padStart(2, "0")}`, `https://example.com/${i}`);
    }
    const recent = await store.recent(10);
    expect(recent.map((r) => r.shortCode)).toEqual([
      "code11", "code10", "code09", "code08", "code07",
      "code06", "code05", "code04", "code03", "code02"
    ]);
  });

  it("ping succeeds", async () => {
    await expect(store.ping()).resolves.toBeUndefined();
  });
});

describe("memory store", () => {
  it("keeps records across close", async () => {
    const store = new MemoryUrlStore();
    await store.insert("abc123", "https://example.com/kept");
    await store.close();
    expect(await store.lookup("abc123")).toBe("https://example.com/kept");
    expect(await store.count()).toBe(1);
  });
});

describe("sqlite store on disk", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "url-service-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates the parent directory and keeps data across reopen", async () => {
    const dbPath = path.join(dir, "nested", "urls.db");

    const first = new SqliteUrlStore(dbPath, { busyTimeoutMs: 1000 });
    await first.init();
    await first.insert("abc123", "https://example.com/kept");
    await first.close();

    expect(fs.existsSync(dbPath)).toBe(true);

    const second = new SqliteUrlStore(dbPath, { busyTimeoutMs: 1000 });
    await second.init();
    expect(await second.lookup("abc123")).toBe("https://example.com/kept");
    expect(await second.count()).toBe(1);
    await second.close();
  });
});
