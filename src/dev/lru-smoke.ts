import assert from "node:assert/strict";
import { SizedLru, SizedLruError, newSizedLru } from "../cache/index.js";
import { createLogger } from "../util/logger.js";
import { loadEnv } from "../config.js";

function main() {
  const log = createLogger(loadEnv(), "lru-smoke");

  assert.throws(() => newSizedLru(0), SizedLruError);

  const evicted: string[] = [];
  const lru = newSizedLru<string, string>(10, (k) => evicted.push(k));
  assert.equal(lru.add("a", "A", 5), false);
  assert.equal(lru.add("b", "B", 5), false);
  assert.equal(lru.add("c", "C", 5), true);
  assert.deepEqual(lru.keys(), ["b", "c"]);
  assert.equal(lru.get("b"), "B");
  assert.equal(lru.add("d", "D", 5), true);
  assert.deepEqual(lru.keys(), ["b", "d"]);
  assert.deepEqual(evicted, ["a", "c"]);

  assert.equal(lru.add("big", "X", 20), true);
  assert.equal(lru.len(), 0);
  assert.equal(lru.size(), 0);

  let nowMs = 1_000;
  const ttl = new SizedLru<string, number>({ sizeLimit: 10, ttlMs: 50, now: () => nowMs });
  ttl.add("k", 1, 1);
  nowMs += 60;
  assert.equal(ttl.get("k"), undefined);
  assert.equal(ttl.len(), 0);

  log.info({ evicted }, "lru smoke ok");
}

main();
