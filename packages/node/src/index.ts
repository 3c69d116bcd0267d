/**
 * @tallybridge/node: HTTP host for the settlement relay.
 *
 * @packageDocumentation
 */

export { RelayService } from "./services/relay-service.js";
export type { RelayServiceConfig, DeliveryInput, TallyView } from "./services/relay-service.js";
export { Ed25519SignatureVerifier, publicKeyFromHex } from "./services/ed25519-verifier.js";
export { logRelayEvents } from "./services/event-logger.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
