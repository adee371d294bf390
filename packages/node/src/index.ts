/**
 * @vestlock/node — HTTP service for the custodial timelock.
 *
 * Importing this module does not start a server; see main.ts.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { loadConfig, parseApiKeys, parseMemoryBalances, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey, SeedBalance } from "./config.js";
export { createRuntime } from "./runtime.js";
export type { Runtime, RuntimeOptions } from "./runtime.js";
export { TimelockService } from "./services/timelock-service.js";
export type {
  TimelockServiceConfig,
  LockDetail,
  ControllerInfo,
} from "./services/timelock-service.js";
export { SerialExecutor } from "./services/serial-executor.js";
export { attachEventLogger } from "./services/event-logger.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
export * from "./routes/index.js";
