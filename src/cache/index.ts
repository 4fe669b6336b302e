import type { Env } from "../config.js";
import type { Logger } from "../util/logger.js";
import { SizedLru, type EvictCallback } from "./sized_lru.js";

export { RecencyIndex, type Handle } from "./recency_index.js";
export { SizedLruError, type SizedLruErrorCode } from "./errors.js";
export {
  SizedLru,
  newSizedLru,
  newSizedLruWithTtl,
  type EvictCallback,
  type LookupResult,
  type LruEntry,
  type SizedLruOptions,
  type SizedLruStats,
} from "./sized_lru.js";

export function createSizedLruFromEnv<K, V>(
  env: Pick<Env, "LRU_SIZE_LIMIT" | "LRU_TTL_MS">,
  opts: { onEvict?: EvictCallback<K, V>; logger?: Logger } = {},
): SizedLru<K, V> {
  const cache = new SizedLru<K, V>({ sizeLimit: env.LRU_SIZE_LIMIT, ttlMs: env.LRU_TTL_MS, onEvict: opts.onEvict });
  opts.logger?.debug({ cache: cache.stats() }, "sized lru created");
  return cache;
}
