import { z } from "zod";

const EnvSchema = z.object({
  APP_ENV: z.enum(["dev", "ci", "prod"]).default("dev"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LRU_SIZE_LIMIT: z.coerce.number().int().positive().optional(),
  // 0 disables expiry.
  LRU_TTL_MS: z.coerce.number().int().min(0).default(0),
  LRU_BENCH_OPS: z.coerce.number().int().positive().max(50_000_000).default(200_000),
  LRU_BENCH_KEYSPACE: z.coerce.number().int().positive().max(10_000_000).default(20_000),
  LRU_BENCH_MAX_ENTRY_SIZE: z.coerce.number().int().positive().default(4096),
});

export const DEFAULT_LRU_SIZE_LIMIT = 1024 * 1024;

export type Env = Omit<z.infer<typeof EnvSchema>, "LRU_SIZE_LIMIT"> & { LRU_SIZE_LIMIT: number };

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid environment:\n${msg}`);
  }
  if (parsed.data.APP_ENV === "prod" && parsed.data.LRU_SIZE_LIMIT === undefined) {
    throw new Error("LRU_SIZE_LIMIT must be set explicitly when APP_ENV=prod");
  }
  return { ...parsed.data, LRU_SIZE_LIMIT: parsed.data.LRU_SIZE_LIMIT ?? DEFAULT_LRU_SIZE_LIMIT };
}
