/**
 * Tests for the resource handle cache.
 */

import { describe, it, expect, vi } from "vitest";
import { ResourceCache } from "../cache/index.js";

interface Handle {
  name: string;
  serial: number;
}

function countingCache(destroy = vi.fn()) {
  let serial = 0;
  const create = vi.fn(async (name: string): Promise<Handle> => {
    await Promise.resolve();
    serial++;
    return { name, serial };
  });
  const cache = new ResourceCache<Handle>({ create, destroy });
  return { cache, create, destroy };
}

describe("ResourceCache", () => {
  describe("getOrCreate", () => {
    it("should construct one handle under concurrent lookups", async () => {
      const { cache, create } = countingCache();

      const handles = await Promise.all([
        cache.getOrCreate("orders"),
        cache.getOrCreate("orders"),
        cache.getOrCreate("orders"),
      ]);

      expect(create).toHaveBeenCalledTimes(1);
      expect(handles[0]).toBe(handles[1]);
      expect(handles[1]).toBe(handles[2]);
    });

    it("should keep one handle per name", async () => {
      const { cache, create } = countingCache();

      const orders = await cache.getOrCreate("orders");
      const events = await cache.getOrCreate("events");

      expect(create).toHaveBeenCalledTimes(2);
      expect(orders.name).toBe("orders");
      expect(events.name).toBe("events");
      expect(cache.names()).toEqual(["orders", "events"]);
      expect(cache.size).toBe(2);
    });

    it("should not cache a failed construction", async () => {
      let fail = true;
      const create = vi.fn(async (name: string) => {
        if (fail) throw new Error("boom");
        return { name, serial: 1 };
      });
      const cache = new ResourceCache<Handle>({ create });

      await expect(cache.getOrCreate("orders")).rejects.toThrow("boom");
      await Promise.resolve();
      expect(cache.has("orders")).toBe(false);

      fail = false;
      await expect(cache.getOrCreate("orders")).resolves.toEqual({ name: "orders", serial: 1 });
      expect(create).toHaveBeenCalledTimes(2);
    });
  });

  describe("invalidate", () => {
    it("should destroy the handle and rebuild on next lookup", async () => {
      const { cache, destroy } = countingCache();

      const first = await cache.getOrCreate("orders");
      await cache.invalidate("orders");
      const second = await cache.getOrCreate("orders");

      expect(destroy).toHaveBeenCalledWith(first, "orders");
      expect(second.serial).toBe(2);
    });

    it("should wait for leases before destroying", async () => {
      const { cache, destroy } = countingCache();
      let release: () => void = () => undefined;
      const held = new Promise<void>((resolve) => {
        release = resolve;
      });

      const leased = cache.lease("orders", () => held);
      await cache.getOrCreate("orders");
      await Promise.resolve();

      const invalidated = cache.invalidate("orders");
      await Promise.resolve();
      expect(destroy).not.toHaveBeenCalled();

      release();
      await leased;
      await invalidated;
      expect(destroy).toHaveBeenCalledTimes(1);
    });

    it("should ignore unknown names", async () => {
      const { cache, destroy } = countingCache();
      await cache.invalidate("missing");
      expect(destroy).not.toHaveBeenCalled();
    });
  });

  describe("close", () => {
    it("should destroy every cached handle", async () => {
      const { cache, destroy } = countingCache();
      await cache.getOrCreate("orders");
      await cache.getOrCreate("events");

      await cache.close();

      expect(destroy).toHaveBeenCalledTimes(2);
      expect(cache.size).toBe(0);
    });
  });
});
