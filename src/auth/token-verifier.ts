/**
 * JWT validation for Bearer tokens.
 *
 * Tokens are issued elsewhere and signed with a shared HS256 secret. The
 * `jose` library verifies the signature and the issuer, audience and
 * expiration claims.
 */

import * as jose from "jose";
import { isUserRole, type UserRole } from "../types/expense-contract.js";

// =============================================================================
// § Types
// =============================================================================

export interface TokenVerifierConfig {
  /** Shared HS256 signing secret */
  secret: string;
  /** Expected `iss` claim, checked when set */
  issuer?: string;
  /** Expected `aud` claim, checked when set */
  audience?: string;
  /** Claim holding the user role (default: 'role') */
  roleClaim?: string;
}

export interface VerifiedIdentity {
  /** Subject (user ID) */
  sub: string;
  role: UserRole;
  /** Display name, from the `name` claim when present */
  name?: string;
}

export type TokenValidationResult =
  | { valid: true; identity: VerifiedIdentity }
  | { valid: false; error: string };

const ALLOWED_ALGORITHMS = ["HS256"];

// =============================================================================
// § Token Verifier
// =============================================================================

export class TokenVerifier {
  private readonly key: Uint8Array;
  private readonly roleClaim: string;

  constructor(private readonly config: TokenVerifierConfig) {
    if (config.secret.length === 0) {
      throw new Error("JWT secret must not be empty");
    }
    this.key = new TextEncoder().encode(config.secret);
    this.roleClaim = config.roleClaim ?? "role";
  }

  /**
   * Validate a JWT with signature verification.
   *
   * Rejects tokens that are expired, carry mismatched claims, lack a
   * `sub`, or name a role outside employee/manager/admin.
   */
  async validateToken(token: string): Promise<TokenValidationResult> {
    try {
      const { payload } = await jose.jwtVerify(token, this.key, {
        issuer: this.config.issuer,
        audience: this.config.audience,
        algorithms: ALLOWED_ALGORITHMS,
      });

      if (!payload.sub) {
        return { valid: false, error: "Missing or invalid 'sub' claim" };
      }

      const role = payload[this.roleClaim];
      if (typeof role !== "string" || !isUserRole(role)) {
        return { valid: false, error: `Missing or invalid '${this.roleClaim}' claim` };
      }

      const name = payload["name"];
      return {
        valid: true,
        identity: {
          sub: payload.sub,
          role,
          name: typeof name === "string" ? name : undefined,
        },
      };
    } catch (err) {
      if (err instanceof jose.errors.JWTExpired) {
        return { valid: false, error: "Token expired" };
      }
      if (err instanceof jose.errors.JWTClaimValidationFailed) {
        return { valid: false, error: `Claim validation failed: ${err.message}` };
      }
      if (err instanceof jose.errors.JWSSignatureVerificationFailed) {
        return { valid: false, error: "Invalid signature" };
      }
      if (err instanceof jose.errors.JOSEAlgNotAllowed) {
        return { valid: false, error: "Algorithm not allowed" };
      }

      return {
        valid: false,
        error: `Token validation failed: ${err instanceof Error ? err.message : String(err)}`,
      };
    }
  }
}
