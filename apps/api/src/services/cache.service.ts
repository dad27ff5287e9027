import { Injectable, Logger } from '@nestjs/common';
import NodeCache from 'node-cache';
import { environment } from '../environments/environment';

/**
 * In-process cache for lookup indexes. Trend data itself is never cached:
 * every pipeline run reads its own clock and fetches fresh.
 */
@Injectable()
export class CacheService {
  private readonly logger = new Logger(CacheService.name);
  private readonly cache: NodeCache;

  constructor() {
    this.cache = new NodeCache({
      stdTTL: environment.cache.lookupTtl,
      checkperiod: 600, // Check for expired keys every 10 minutes
      useClones: false, // cached indexes are class instances
    });
  }

  get<T>(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  set<T>(key: string, value: T, ttlSeconds?: number): boolean {
    if (ttlSeconds) {
      return this.cache.set(key, value, ttlSeconds);
    }
    return this.cache.set(key, value);
  }

  /**
   * Drop a key so the next read refetches it
   */
  del(key: string): number {
    return this.cache.del(key);
  }

  /**
   * Get or set pattern - retrieve from cache or fetch and cache.
   * A failing fetch caches nothing and rethrows.
   */
  async getOrSet<T>(
    key: string,
    fetchFn: () => Promise<T>,
    ttlSeconds?: number
  ): Promise<T> {
    const cached = this.get<T>(key);
    if (cached !== undefined) {
      this.logger.debug(`Cache hit for key: ${key}`);
      return cached;
    }

    this.logger.debug(`Cache miss for key: ${key}, fetching...`);
    const value = await fetchFn();
    this.set(key, value, ttlSeconds);
    return value;
  }
}
