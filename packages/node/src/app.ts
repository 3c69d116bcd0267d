/**
 * Hono application factory.
 *
 * Separated from main.ts so tests create the app without starting the
 * HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { RelayService } from "./services/relay-service.js";
import type { RelayServiceConfig } from "./services/relay-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createDeliveryRoutes } from "./routes/deliveries.js";
import { createSignedVoteRoutes } from "./routes/signed-votes.js";
import { createOracleRoutes } from "./routes/oracle.js";
import { createProposalRoutes } from "./routes/proposals.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: RelayServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** When provided, API routes require an X-Api-Key */
  readonly auth?: AuthConfig | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: RelayService;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const service = new RelayService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    c.set("auth", undefined);
    await next();
  });

  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes());

  // ─── Secured Routes ─────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
    app.use("/transport/*", authMiddleware(options.auth));
  }

  app.route("/transport", createDeliveryRoutes());
  app.route("/api/v1/signed-votes", createSignedVoteRoutes());
  app.route("/api/v1/oracle", createOracleRoutes());
  app.route("/api/v1/proposals", createProposalRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
