/**
 * Authentication middleware.
 *
 * API key via X-Api-Key header, looked up in the configured key registry.
 * On success, sets `c.set("auth", authContext)`; otherwise 401.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", { identity: record.key, role: record.role });
    return next();
  };
}

/**
 * Permission guard. Returns 403 if the authenticated role lacks the
 * permission. Without an auth context (unsecured mode) everything passes.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (auth !== undefined && !hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope("FORBIDDEN", `Role '${auth.role}' lacks '${permission}' permission`),
        403,
      );
    }
    return next();
  };
}
