/**
 * Caching and rate limiting for AI roadmap generation.
 * Generated roadmaps are reused for an hour and provider calls are throttled
 * so a user clicking "Regenerate" repeatedly cannot burn through an API quota.
 */

interface CacheEntry {
  markdown: string;
  timestamp: number;
}

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

export interface RoadmapCacheOptions {
  ttlMs: number;
  windowMs: number;
  maxRequestsPerWindow: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  retryAfter?: number; // seconds
}

export const DEFAULT_CACHE_OPTIONS: RoadmapCacheOptions = {
  ttlMs: 60 * 60 * 1000, // 1 hour
  windowMs: 60 * 1000, // 1 minute
  maxRequestsPerWindow: 5
};

export class RoadmapCache {
  private readonly cache: Map<string, CacheEntry> = new Map();
  private readonly rateLimits: Map<string, RateLimitEntry> = new Map();
  private readonly options: RoadmapCacheOptions;

  constructor(options: Partial<RoadmapCacheOptions> = {}) {
    this.options = { ...DEFAULT_CACHE_OPTIONS, ...options };
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.timestamp > this.options.ttlMs;
  }

  /**
   * Cached roadmap for a key, or null when missing or expired
   */
  get(key: string): string | null {
    const entry = this.cache.get(key);
    if (!entry) {
      return null;
    }

    if (this.isExpired(entry, Date.now())) {
      this.cache.delete(key);
      return null;
    }

    return entry.markdown;
  }

  set(key: string, markdown: string): void {
    this.cache.set(key, {
      markdown,
      timestamp: Date.now()
    });
  }

  /**
   * Counts one request against the identifier's fixed window.
   */
  checkRateLimit(identifier: string = 'global'): RateLimitDecision {
    const now = Date.now();
    const entry = this.rateLimits.get(identifier);

    if (!entry || now >= entry.resetTime) {
      this.rateLimits.set(identifier, {
        count: 1,
        resetTime: now + this.options.windowMs
      });
      return { allowed: true };
    }

    if (entry.count >= this.options.maxRequestsPerWindow) {
      return { allowed: false, retryAfter: Math.ceil((entry.resetTime - now) / 1000) };
    }

    entry.count++;
    return { allowed: true };
  }

  /**
   * Drops expired entries
   */
  cleanup(): void {
    const now = Date.now();
    for (const [key, entry] of this.cache.entries()) {
      if (this.isExpired(entry, now)) {
        this.cache.delete(key);
      }
    }
  }

  clear(): void {
    this.cache.clear();
    this.rateLimits.clear();
  }

  getStats(): { size: number; entries: Array<{ key: string; age: number }> } {
    const now = Date.now();
    const entries = Array.from(this.cache.entries()).map(([key, entry]) => ({
      key,
      age: Math.floor((now - entry.timestamp) / 1000 / 60) // minutes
    }));

    return {
      size: this.cache.size,
      entries
    };
  }
}

export const roadmapCache = new RoadmapCache();

// Sweep expired roadmaps every 5 minutes in the browser
if (typeof window !== 'undefined' && import.meta.env.MODE !== 'test') {
  setInterval(() => {
    roadmapCache.cleanup();
  }, 5 * 60 * 1000);
}
