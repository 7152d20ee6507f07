export interface UrlRecord {
  id: number;
  shortCode: string;
  longUrl: string;
  createdAt: string;
}

/**
 * Durable short_code -> long_url mapping.
 * `insert` must reject an existing code with DuplicateCodeError; the unique
 * constraint is what keeps concurrent allocations safe.
 */
export interface UrlStore {
  init(): Promise<void>;
  ping(): Promise<void>;
  exists(code: string): Promise<boolean>;
  insert(code: string, longUrl: string): Promise<UrlRecord>;
  lookup(code: string): Promise<string | null>;
  count(): Promise<number>;
  /** Newest first, at most `limit` records. */
  recent(limit: number): Promise<UrlRecord[]>;
  close(): Promise<void>;
}
