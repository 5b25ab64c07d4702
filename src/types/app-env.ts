/**
 * Hono environment shared by the app, its middleware and its routers.
 */

import type { AuthContext } from "../auth/middleware.js";

export interface AppEnv {
  Variables: {
    requestId: string;
    auth: AuthContext;
  };
}
