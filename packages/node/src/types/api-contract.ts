/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { RelayService } from "../services/relay-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The relay's composition root */
    service: RelayService;

    /**
     * Authentication context. Absent in unsecured mode, where every
     * permission is granted.
     */
    auth: AuthContext | undefined;
  };
}
