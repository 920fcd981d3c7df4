/**
 * Capability cache: a time-bounded memo in front of one loader call
 */

import { EventEmitter } from "events";
import NodeCache from "node-cache";

export interface CacheEntry<T> {
  readonly value: T;
  readonly capturedAt: number;
}

export interface CapabilityCacheOptions {
  /** Clock in epoch ms; injectable for tests */
  now?: () => number;
}

export interface CapabilityCacheStats {
  hits: number;
  misses: number;
  refreshes: number;
}

const ENTRY_KEY = "capabilities";

/**
 * Holds a single entry, replaced wholesale on refresh.
 *
 * Freshness is decided per call (`now - capturedAt < ttlMs`) rather than by
 * node-cache expiry, so one entry can be read under different TTLs.
 * Concurrent callers that find the entry stale share one loader run.
 */
export class CapabilityCache<T> extends EventEmitter {
  private readonly cache = new NodeCache({
    stdTTL: 0,
    checkperiod: 0,
    useClones: false,
  });
  private readonly now: () => number;
  private inflight: Promise<T> | null = null;
  private stats: CapabilityCacheStats = { hits: 0, misses: 0, refreshes: 0 };

  constructor(options: CapabilityCacheOptions = {}) {
    super();
    this.now = options.now ?? Date.now;
  }

  async getOrRefresh(loader: () => Promise<T>, ttlMs: number): Promise<T> {
    const entry = this.peek();
    if (entry && this.now() - entry.capturedAt < ttlMs) {
      this.stats.hits++;
      this.emit("hit", { capturedAt: entry.capturedAt });
      return entry.value;
    }

    this.stats.misses++;
    this.emit("miss", { stale: entry !== undefined });
    return this.refresh(loader);
  }

  /**
   * Run the loader and store its value; a failing loader leaves the previous
   * entry untouched
   */
  refresh(loader: () => Promise<T>): Promise<T> {
    if (this.inflight) {
      return this.inflight;
    }

    const run = (async () => {
      const value = await loader();
      const entry: CacheEntry<T> = { value, capturedAt: this.now() };
      this.cache.set(ENTRY_KEY, entry);
      this.stats.refreshes++;
      this.emit("refresh", { capturedAt: entry.capturedAt });
      return value;
    })();

    this.inflight = run;
    const clear = () => {
      if (this.inflight === run) {
        this.inflight = null;
      }
    };
    void run.then(clear, clear);
    return run;
  }

  peek(): CacheEntry<T> | undefined {
    return this.cache.get<CacheEntry<T>>(ENTRY_KEY);
  }

  invalidate(): void {
    this.cache.del(ENTRY_KEY);
    this.emit("invalidate");
  }

  getStats(): CapabilityCacheStats {
    return { ...this.stats };
  }

  destroy(): void {
    this.cache.close();
    this.removeAllListeners();
  }
}
