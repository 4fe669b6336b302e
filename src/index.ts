export * from "./cache/index.js";
export { loadEnv, DEFAULT_LRU_SIZE_LIMIT, type Env } from "./config.js";
export { createLogger, type Logger } from "./util/logger.js";
export { formatError } from "./util/error-format.js";
