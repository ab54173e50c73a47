export * from "./bitcoind/index.js";
export { type Config, configSchema, parseConfig } from "./config/index.js";
export { logger } from "./config/logger.js";
