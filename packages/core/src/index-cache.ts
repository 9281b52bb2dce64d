import type { Logger } from "@contract-qa/logger";
import type { DocumentIndex } from "./document-index.js";

export interface IndexCacheOptions {
  /** Most indexes kept before the least recently used one is dropped. */
  maxEntries: number;
  logger: Logger;
}

export interface CacheLookup {
  index: DocumentIndex;
  /** True when the index was already built or being built. */
  hit: boolean;
}

/**
 * Content-addressed store of built indexes. Concurrent requests for one key
 * share a single build; a build that fails is dropped so the next request
 * starts over.
 */
export class IndexCache {
  // Map iteration order doubles as recency order: oldest first.
  private entries = new Map<string, Promise<DocumentIndex>>();
  private readonly maxEntries: number;
  private readonly logger: Logger;

  constructor(options: IndexCacheOptions) {
    this.maxEntries = Math.max(1, options.maxEntries);
    this.logger = options.logger;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  async getOrBuild(key: string, build: () => Promise<DocumentIndex>): Promise<CacheLookup> {
    const existing = this.entries.get(key);
    if (existing) {
      this.touch(key, existing);
      this.logger.debug({ key: key.slice(0, 12) }, "index cache hit");
      return { index: await existing, hit: true };
    }

    this.logger.debug({ key: key.slice(0, 12) }, "index cache miss");
    const pending = build();
    this.entries.set(key, pending);
    this.evictOverflow();

    try {
      return { index: await pending, hit: false };
    } catch (error: unknown) {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
      throw error;
    }
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  private touch(key: string, entry: Promise<DocumentIndex>): void {
    this.entries.delete(key);
    this.entries.set(key, entry);
  }

  private evictOverflow(): void {
    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) break;
      this.entries.delete(key);
      this.logger.debug({ key: key.slice(0, 12) }, "index evicted");
    }
  }
}
