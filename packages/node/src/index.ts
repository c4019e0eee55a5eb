/**
 * @escrowhook/node: package public API.
 */

export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createPipeline, TRADES_FILE, DEAD_LETTERS_FILE } from "./services/pipeline.js";
export type { Pipeline, PipelineOptions } from "./services/pipeline.js";
export {
  InMemoryAddressBook,
  loadAddressBookFile,
  AddressBookFileSchema,
} from "./services/address-book.js";
export type { AddressBook, AddressBookData } from "./services/address-book.js";
export {
  computeSignature,
  verifySignature,
  SIGNATURE_HEADER,
} from "./services/signature.js";
export type { SignatureCheck } from "./services/signature.js";
export {
  buildStatusSnapshot,
  computeHealth,
  successRate,
  HEALTH_THRESHOLDS,
} from "./services/monitoring.js";
export type { HealthIndicator, StatusSnapshot } from "./services/monitoring.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
