import { LRUCache } from "lru-cache";

import { appConfig } from "../config.js";

export function createTTLCache<
  K extends NonNullable<unknown>,
  V extends NonNullable<unknown>,
>(
  ttlMs: number = appConfig.cache.ttlMs,
  max: number = appConfig.cache.maxEntries,
): LRUCache<K, V> {
  return new LRUCache<K, V>({
    max,
    ttl: ttlMs,
    updateAgeOnGet: true,
    updateAgeOnHas: true,
  });
}
