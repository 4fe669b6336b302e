import "dotenv/config";
import { loadEnv } from "../config.js";
import { createLogger } from "../util/logger.js";
import { formatError } from "../util/error-format.js";
import { runLruBench } from "./lruBenchLib.js";

function argValue(flag: string): string | null {
  const i = process.argv.indexOf(flag);
  if (i === -1) return null;
  const v = process.argv[i + 1];
  if (!v || v.startsWith("--")) return null;
  return v;
}

function clampInt(v: number, min: number, max: number): number {
  if (!Number.isFinite(v)) return min;
  return Math.max(min, Math.min(max, Math.trunc(v)));
}

async function main() {
  const env = loadEnv();
  const log = createLogger(env, "lru-benchmark");

  const ops = clampInt(Number(argValue("--ops") ?? env.LRU_BENCH_OPS), 1, 50_000_000);
  const keyspace = clampInt(Number(argValue("--keyspace") ?? env.LRU_BENCH_KEYSPACE), 1, 10_000_000);
  const maxEntrySize = clampInt(Number(argValue("--max-entry-size") ?? env.LRU_BENCH_MAX_ENTRY_SIZE), 1, 1 << 30);
  const sizeLimit = clampInt(Number(argValue("--size-limit") ?? env.LRU_SIZE_LIMIT), 1, Number.MAX_SAFE_INTEGER);
  const ttlMs = clampInt(Number(argValue("--ttl-ms") ?? env.LRU_TTL_MS), 0, 86_400_000);
  const seed = clampInt(Number(argValue("--seed") ?? "42"), 0, 0xffffffff);
  const readRatioRaw = Number(argValue("--read-ratio") ?? "0.8");
  const readRatio = Number.isFinite(readRatioRaw) ? Math.max(0, Math.min(1, readRatioRaw)) : 0.8;

  log.info({ ops, keyspace, max_entry_size: maxEntrySize, size_limit: sizeLimit, ttl_ms: ttlMs, seed }, "benchmark start");
  const t0 = Date.now();
  const report = runLruBench({ ops, keyspace, maxEntrySize, sizeLimit, ttlMs, readRatio, seed });
  const elapsedMs = Date.now() - t0;
  log.info({ elapsed_ms: elapsedMs, hit_rate: report.hit_rate }, "benchmark done");

  // eslint-disable-next-line no-console
  console.log(
    JSON.stringify(
      {
        ok: true,
        elapsed_ms: elapsedMs,
        ops_per_sec: elapsedMs > 0 ? Math.round((ops * 1000) / elapsedMs) : null,
        config: { ops, keyspace, max_entry_size: maxEntrySize, size_limit: sizeLimit, ttl_ms: ttlMs, read_ratio: readRatio, seed },
        report,
      },
      null,
      2,
    ),
  );
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(formatError(err));
  process.exitCode = 1;
});
