import type { FastifyBaseLogger } from "fastify";
import { AllocationExhaustedError, DuplicateCodeError } from "./errors.js";
import { shortCodeCollisionsTotal, shortCodesAllocatedTotal } from "./metrics.js";
import type { CodeGenerator } from "./shortcode.js";
import type { UrlRecord, UrlStore } from "./storage.js";

export interface AllocatorDeps {
  store: UrlStore;
  generate: CodeGenerator;
  codeLength: number;
  maxAttempts: number;
  log: FastifyBaseLogger;
}

/**
 * Finds a free code for `longUrl` and inserts it.
 * The exists() probe skips known collisions cheaply; a DuplicateCodeError from
 * insert() means another writer took the code in between, and counts as one too.
 */
export async function allocateShortCode(deps: AllocatorDeps, longUrl: string): Promise<UrlRecord> {
  const { store, generate, codeLength, maxAttempts, log } = deps;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const candidate = generate(longUrl, attempt, codeLength);

    if (await store.exists(candidate)) {
      shortCodeCollisionsTotal.inc();
      log.debug({ attempt, candidate }, "short code collision");
      continue;
    }

    try {
      const rec = await store.insert(candidate, longUrl);
      shortCodesAllocatedTotal.inc();
      return rec;
    } catch (e) {
      if (!(e instanceof DuplicateCodeError)) throw e;
      shortCodeCollisionsTotal.inc();
      log.debug({ attempt, candidate }, "short code taken concurrently");
    }
  }

  log.warn({ attempts: maxAttempts }, "short code allocation exhausted");
  throw new AllocationExhaustedError(maxAttempts);
}
