/**
 * @tallybridge/node: Entry point.
 *
 * Loads config, opens the event log, starts the HTTP server and handles
 * graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { InMemoryEventStore, JsonlEventStore } from "@tallybridge/event-store";
import type { EventStore, SubscriberErrorHandler } from "@tallybridge/event-store";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import { logRelayEvents } from "./services/event-logger.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let auth: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const apiKeys = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      apiKeys.set(k.key, k);
    }
    auth = { apiKeys };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured; running in unsecured mode");
  }

  const onSubscriberError: SubscriberErrorHandler = (err, event) => {
    logger.error({ err, position: event.globalPosition, type: event.event.type }, "Event subscriber failed");
  };

  let events: EventStore;
  if (config.EVENT_LOG_PATH !== undefined) {
    const jsonl = new JsonlEventStore({ filePath: config.EVENT_LOG_PATH, onSubscriberError });
    if (jsonl.truncatedBytes > 0) {
      logger.warn({ eventLog: jsonl.filePath, bytes: jsonl.truncatedBytes }, "Cut a torn record from the event log");
    }
    events = jsonl;
  } else {
    events = new InMemoryEventStore({ onSubscriberError });
  }
  logger.info(
    { eventLog: config.EVENT_LOG_PATH ?? "memory", events: events.globalPosition() },
    "Event log opened",
  );

  const { app, service } = createApp({
    serviceConfig: {
      trustedTransport: config.TRUSTED_TRANSPORT_ADDRESS,
      fallbackRoute: config.FALLBACK_ROUTE,
      computeCeiling: config.COMPUTE_CEILING,
      emitDuplicateRejections: config.EMIT_DUPLICATE_REJECTIONS,
      normalizer: {
        mode: config.WEIGHT_MODE,
        stalenessWindowSeconds: config.STALENESS_WINDOW_SECONDS,
        staleOraclePolicy: config.STALE_ORACLE_POLICY,
      },
      events,
      onInternalError: (err, receiptId) => {
        logger.error({ err, receiptId }, "Delivery fault forwarded to fallback");
      },
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    auth,
  });

  const subscription = logRelayEvents(service.events, logger);

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, proposals: service.listProposals().length },
    "Relay node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.stop();
    subscription.unsubscribe();
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Server close failed");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
