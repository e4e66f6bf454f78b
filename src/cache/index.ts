/**
 * Resource handle cache.
 *
 * Maps a topic or subscription name to one lazily created handle.
 * Concurrent requests for the same name share a single construction;
 * a failed construction is not cached.
 */

import { Logger, NoopLogger } from "../observability/index.js";

/**
 * Cache options.
 */
export interface ResourceCacheOptions<H> {
  /** Builds the handle for a name. */
  create: (name: string) => Promise<H>;
  /** Tears a handle down after eviction, once no lease holds it. */
  destroy?: (handle: H, name: string) => Promise<void> | void;
  logger?: Logger;
}

interface CacheEntry<H> {
  handle: Promise<H>;
  leases: number;
  evicted: boolean;
  onIdle: Array<() => void>;
}

/**
 * Resource cache with in-use tracking.
 */
export class ResourceCache<H> {
  private readonly entries = new Map<string, CacheEntry<H>>();
  private readonly options: ResourceCacheOptions<H>;
  private readonly logger: Logger;

  constructor(options: ResourceCacheOptions<H>) {
    this.options = options;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Get the handle for `name`, creating it on first use.
   */
  getOrCreate(name: string): Promise<H> {
    return this.entry(name).handle;
  }

  /**
   * Run `fn` with the handle for `name`, holding it in use until `fn`
   * settles. An invalidation issued meanwhile waits for the lease.
   */
  async lease<T>(name: string, fn: (handle: H) => Promise<T>): Promise<T> {
    for (;;) {
      const entry = this.entry(name);
      const handle = await entry.handle;
      if (entry.evicted) {
        continue;
      }

      entry.leases++;
      try {
        return await fn(handle);
      } finally {
        entry.leases--;
        if (entry.evicted && entry.leases === 0) {
          for (const resolve of entry.onIdle.splice(0)) resolve();
        }
      }
    }
  }

  /**
   * Evict the handle for `name`. The handle is destroyed once every
   * lease on it has ended; later lookups build a fresh handle.
   */
  async invalidate(name: string): Promise<void> {
    const entry = this.entries.get(name);
    if (!entry) return;

    this.entries.delete(name);
    entry.evicted = true;

    let handle: H;
    try {
      handle = await entry.handle;
    } catch {
      // Construction failed; nothing to tear down.
      return;
    }

    if (entry.leases > 0) {
      await new Promise<void>((resolve) => entry.onIdle.push(resolve));
    }

    this.logger.debug("Destroying resource handle", { name });
    await this.options.destroy?.(handle, name);
  }

  /**
   * Evict every cached handle.
   */
  async close(): Promise<void> {
    await Promise.all([...this.entries.keys()].map((name) => this.invalidate(name)));
  }

  /**
   * Whether a handle for `name` is cached or under construction.
   */
  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Names with a cached or in-construction handle.
   */
  names(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  private entry(name: string): CacheEntry<H> {
    const existing = this.entries.get(name);
    if (existing) {
      return existing;
    }

    const entry: CacheEntry<H> = {
      handle: new Promise<H>((resolve) => resolve(this.options.create(name))),
      leases: 0,
      evicted: false,
      onIdle: [],
    };

    void entry.handle.then(
      () => this.logger.debug("Created resource handle", { name }),
      (error: unknown) => {
        if (this.entries.get(name) === entry) {
          this.entries.delete(name);
        }
        this.logger.warn("Resource handle construction failed", { name, error });
      }
    );

    this.entries.set(name, entry);
    return entry;
  }
}
