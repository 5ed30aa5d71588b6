/**
 * @custody/node — HTTP node for the custody ledger.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { CustodyService } from "./services/custody-service.js";
export type {
  CustodyServiceConfig,
  OperationName,
  SubsystemStatus,
} from "./services/custody-service.js";
export { ObservingEventSink } from "./services/event-sink.js";
export { createOracle } from "./services/oracle-factory.js";
export type { ManagedOracle } from "./services/oracle-factory.js";
export { loadConfig, parseSeedHoldings, ConfigSchema } from "./config.js";
export type { AppConfig, SeedHolding } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
