/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { TallybookService } from "../services/tallybook-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Service for the tenant named by X-Tenant-Id, or the default tenant */
    service: TallybookService;

    /** Who is acting, from X-Actor (default "api"); recorded in the audit log */
    actor: string;
  };
}
