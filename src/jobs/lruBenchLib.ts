import { SizedLru } from "../cache/sized_lru.js";

export type LruBenchOptions = {
  ops: number;
  keyspace: number;
  maxEntrySize: number;
  sizeLimit: number;
  ttlMs: number;
  readRatio: number; // fraction of ops that are reads, 0..1
  seed: number;
  maxLatencySamples?: number;
  now?: () => number;
};

export const DEFAULT_MAX_LATENCY_SAMPLES = 100_000;

export type LruBenchReport = {
  ops: number;
  reads: number;
  writes: number;
  hits: number;
  misses: number;
  hit_rate: number;
  add_evictions: number;
  evict_callbacks: number;
  evicted_size: number;
  final: { entries: number; size: number; size_limit: number; ttl_ms: number };
  latency_samples: number;
  latency_us: { p50: number; p95: number; p99: number; max: number; mean: number };
};

// mulberry32: small deterministic PRNG so runs are repeatable for a given seed.
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function quantile(sorted: number[], q: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.max(0, Math.min(sorted.length - 1, Math.ceil(sorted.length * q) - 1));
  return sorted[idx];
}

export function round(v: number, d = 3): number {
  const f = 10 ** d;
  return Math.round(v * f) / f;
}

export function runLruBench(opts: LruBenchOptions): LruBenchReport {
  let evictCallbacks = 0;
  let evictedSize = 0;
  const cache = new SizedLru<string, number>({
    sizeLimit: opts.sizeLimit,
    ttlMs: opts.ttlMs,
    now: opts.now,
    onEvict: (_key, _value, size) => {
      evictCallbacks += 1;
      evictedSize += size;
    },
  });

  const rand = seededRandom(opts.seed);
  // Skew key choice towards low ids so there is a hot set worth caching.
  const pickKey = () => `k${Math.floor(rand() * rand() * opts.keyspace)}`;

  // Reservoir of per-op latencies; its own PRNG keeps the workload identical across sample sizes.
  const maxSamples = Math.max(1, Math.trunc(opts.maxLatencySamples ?? DEFAULT_MAX_LATENCY_SAMPLES));
  const sampleRand = seededRandom(opts.seed ^ 0x9e3779b9);
  const samples: number[] = [];
  let reads = 0;
  let hits = 0;
  let addEvictions = 0;

  for (let i = 0; i < opts.ops; i += 1) {
    const key = pickKey();
    const isRead = rand() < opts.readRatio;
    const t0 = process.hrtime.bigint();
    if (isRead) {
      reads += 1;
      if (cache.get(key) !== undefined) hits += 1;
    } else {
      const size = 1 + Math.floor(rand() * opts.maxEntrySize);
      if (cache.add(key, i, size)) addEvictions += 1;
    }
    const us = Number(process.hrtime.bigint() - t0) / 1_000;
    if (samples.length < maxSamples) {
      samples.push(us);
    } else {
      const j = Math.floor(sampleRand() * (i + 1));
      if (j < maxSamples) samples[j] = us;
    }
  }

  samples.sort((a, b) => a - b);
  const sum = samples.reduce((a, b) => a + b, 0);
  return {
    ops: opts.ops,
    reads,
    writes: opts.ops - reads,
    hits,
    misses: reads - hits,
    hit_rate: reads > 0 ? round(hits / reads, 6) : 0,
    add_evictions: addEvictions,
    evict_callbacks: evictCallbacks,
    evicted_size: evictedSize,
    final: cache.stats(),
    latency_samples: samples.length,
    latency_us: {
      p50: round(quantile(samples, 0.5)),
      p95: round(quantile(samples, 0.95)),
      p99: round(quantile(samples, 0.99)),
      max: round(samples[samples.length - 1] ?? 0),
      mean: samples.length > 0 ? round(sum / samples.length) : 0,
    },
  };
}
