import type { LoggerMethods } from '@legisight/logger';

import { LRUCache } from 'lru-cache';

export interface AnalysisCacheOptions {
  /**
   * Maximum number of settled entries kept (default: 500)
   */
  maxEntries?: number;

  /**
   * Time a settled entry stays valid in milliseconds (default: 30 minutes)
   */
  ttlMs?: number;
}

export type CacheEntryState = 'pending' | 'ready' | 'absent';

export interface AnalysisCacheStats {
  /**
   * Lookups served from a settled entry
   */
  hits: number;

  /**
   * Lookups that found no settled entry (in-flight joins plus computations)
   */
  misses: number;

  /**
   * Lookups that waited on a computation another caller started
   */
  inFlightJoins: number;

  /**
   * Computations started
   */
  computations: number;

  /**
   * Computations that failed and were not cached
   */
  failures: number;

  /**
   * Settled entries currently held
   */
  size: number;
}

/**
 * AnalysisCache - single-flight cache keyed by content fingerprint
 *
 * For one fingerprint, `compute` runs at most once among concurrent callers;
 * everyone who arrives while it is pending shares its promise and receives the
 * same value or the same error. Only successful results are stored. Settled
 * entries are evicted by size and age; in-flight computations live outside
 * the LRU and are never evicted.
 */
export class AnalysisCache<TValue extends object> {
  private readonly settled: LRUCache<string, TValue>;
  private readonly inFlight = new Map<string, Promise<TValue>>();
  private readonly stats = {
    hits: 0,
    inFlightJoins: 0,
    computations: 0,
    failures: 0,
  };

  constructor(
    private readonly logger: LoggerMethods,
    options: AnalysisCacheOptions = {},
  ) {
    this.settled = new LRUCache<string, TValue>({
      max: options.maxEntries ?? 500,
      ttl: options.ttlMs ?? 30 * 60 * 1000,
    });
  }

  async getOrCompute(
    fingerprint: string,
    compute: () => Promise<TValue>,
  ): Promise<TValue> {
    const cached = this.settled.get(fingerprint);
    if (cached !== undefined) {
      this.stats.hits++;
      this.logger.debug(`[AnalysisCache] Hit for ${fingerprint}`);
      return cached;
    }

    const pending = this.inFlight.get(fingerprint);
    if (pending) {
      this.stats.inFlightJoins++;
      this.logger.debug(`[AnalysisCache] Joining in-flight ${fingerprint}`);
      return pending;
    }

    this.stats.computations++;
    const computation = this.run(fingerprint, compute);
    this.inFlight.set(fingerprint, computation);
    return computation;
  }

  getState(fingerprint: string): CacheEntryState {
    if (this.inFlight.has(fingerprint)) return 'pending';
    return this.settled.has(fingerprint) ? 'ready' : 'absent';
  }

  getStats(): AnalysisCacheStats {
    return {
      ...this.stats,
      misses: this.stats.inFlightJoins + this.stats.computations,
      size: this.settled.size,
    };
  }

  /**
   * Drop a settled entry. A computation in flight for the fingerprint is left
   * alone and will store its result when it settles.
   */
  invalidate(fingerprint: string): boolean {
    return this.settled.delete(fingerprint);
  }

  /**
   * Drop every settled entry
   */
  clear(): void {
    this.settled.clear();
  }

  private async run(
    fingerprint: string,
    compute: () => Promise<TValue>,
  ): Promise<TValue> {
    try {
      // deferred so the in-flight entry exists before compute can settle
      const value = await Promise.resolve().then(compute);
      this.settled.set(fingerprint, value);
      return value;
    } catch (error) {
      this.stats.failures++;
      throw error;
    } finally {
      this.inFlight.delete(fingerprint);
    }
  }
}
