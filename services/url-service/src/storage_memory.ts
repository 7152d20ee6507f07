import { DuplicateCodeError } from "./errors.js";
import type { UrlRecord, UrlStore } from "./storage.js";

export class MemoryUrlStore implements UrlStore {
  private readonly map = new Map<string, UrlRecord>();
  private nextId = 1;

  async init(): Promise<void> {
    // nothing
  }

  async ping(): Promise<void> {
    // nothing
  }

  async exists(code: string): Promise<boolean> {
    return this.map.has(code);
  }

  async insert(code: string, longUrl: string): Promise<UrlRecord> {
    if (this.map.has(code)) throw new DuplicateCodeError(code);
    const rec: UrlRecord = {
      id: this.nextId++,
      shortCode: code,
      longUrl,
      createdAt: new Date().toISOString()
    };
    this.map.set(code, rec);
    return rec;
  }

  async lookup(code: string): Promise<string | null> {
    return this.map.get(code)?.longUrl ?? null;
  }

  async count(): Promise<number> {
    return this.map.size;
  }

  async recent(limit: number): Promise<UrlRecord[]> {
    return [...this.map.values()].sort((a, b) => b.id - a.id).slice(0, limit);
  }

  async close(): Promise<void> {
    // nothing
  }
}
