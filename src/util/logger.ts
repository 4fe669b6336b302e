import { pino, type Logger } from "pino";
import type { Env } from "../config.js";

export type { Logger };

export function createLogger(env: Pick<Env, "APP_ENV" | "LOG_LEVEL">, name: string): Logger {
  return pino({ name, level: env.LOG_LEVEL, base: { app_env: env.APP_ENV } });
}
