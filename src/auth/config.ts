/**
 * Auth Configuration
 *
 * Builds the `AuthConfig` for the middleware pipeline from the JWT settings
 * of the application config (null when auth is disabled).
 */

import type { JwtSettings } from '../config.js';
import type { AuthConfig } from './middleware.js';
import { TokenVerifier } from './token-verifier.js';

export function createAuthConfig(jwt: JwtSettings | null): AuthConfig {
  if (!jwt) {
    return { enabled: false };
  }

  return {
    enabled: true,
    verifier: new TokenVerifier({
      secret: jwt.secret,
      issuer: jwt.issuer,
      audience: jwt.audience,
      roleClaim: jwt.roleClaim,
    }),
  };
}
