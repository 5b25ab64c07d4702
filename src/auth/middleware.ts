/**
 * Auth Middleware: Hono middleware pipeline for authentication.
 *
 * Supports:
 * - JWT authentication (Authorization: Bearer <jwt>)
 * - Header identity when auth is disabled (X-User-Id, X-User-Role; dev only)
 */

import type { Context, MiddlewareHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { AppEnv } from "../types/app-env.js";
import { UserId } from "../types/branded.js";
import { isUserRole, type Actor } from "../types/expense-contract.js";
import { createChildLogger } from "../logging.js";
import { hasPermission, type Permission, type Role } from "./rbac.js";
import type { TokenVerifier } from "./token-verifier.js";

// =============================================================================
// § Types
// =============================================================================

export type AuthConfig =
  | { enabled: false }
  | { enabled: true; verifier: TokenVerifier };

export interface AuthContext {
  userId: UserId;
  role: Role;
  /** Display name carried by the token, if any */
  name?: string;
  authMethod: "jwt" | "header";
}

function unauthorized(c: Context<AppEnv>, message: string): Response {
  return c.json({ ok: false, error: { type: "unauthorized", message } }, 401);
}

// =============================================================================
// § Middleware Factory
// =============================================================================

/**
 * Create the auth middleware.
 *
 * When auth is disabled the caller identifies itself through headers;
 * X-User-Role defaults to employee.
 */
export function createAuthMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  const logger = createChildLogger({ component: "auth" });

  return async (c, next) => {
    if (!config.enabled) {
      const userId = c.req.header("X-User-Id")?.trim();
      const role = c.req.header("X-User-Role")?.trim().toLowerCase() ?? "employee";

      if (!userId) {
        return unauthorized(c, "Missing X-User-Id header");
      }
      if (!isUserRole(role)) {
        return unauthorized(c, `Unknown role: ${role}`);
      }

      c.set("auth", { userId: UserId(userId), role, authMethod: "header" });
      return next();
    }

    const authHeader = c.req.header("Authorization");

    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      return unauthorized(c, "Missing or invalid Authorization header");
    }

    const result = await config.verifier.validateToken(authHeader.slice("Bearer ".length));

    if (!result.valid) {
      logger.debug({ reason: result.error }, "Token rejected");
      return unauthorized(c, "Authentication failed");
    }

    c.set("auth", {
      userId: UserId(result.identity.sub),
      role: result.identity.role,
      name: result.identity.name,
      authMethod: "jwt",
    });
    return next();
  };
}

/**
 * Create a permission-checking middleware.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = getAuthContext(c);

    if (!auth) {
      return unauthorized(c, "Not authenticated");
    }

    if (!hasPermission(auth.role, permission)) {
      return c.json(
        {
          ok: false,
          error: { type: "forbidden", message: `Missing permission: ${permission}` },
        },
        403
      );
    }

    return next();
  };
}

// =============================================================================
// § Context Accessors
// =============================================================================

export function getAuthContext(c: Context<AppEnv>): AuthContext | undefined {
  return c.get("auth");
}

/**
 * The authenticated caller as a service Actor.
 *
 * @throws HTTPException 401 when the auth middleware did not run
 */
export function requireActor(c: Context<AppEnv>): Actor {
  const auth = getAuthContext(c);
  if (!auth) {
    throw new HTTPException(401, { message: "Not authenticated" });
  }
  return { userId: auth.userId, role: auth.role };
}
