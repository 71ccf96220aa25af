/**
 * Hono server configuration for DeckBridge
 *
 * Provides:
 * - Action endpoint and version banner at /
 * - Media file serving at /media/:filename
 * - CORS headers for browser clients
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import type { ActionDispatcher } from "./action-dispatcher";
import type { ProfileManager } from "./host/profile-manager";
import { restErrorHandler } from "./middleware/error-handler";
import { createActionRoutes } from "./routes/actions";
import { createMediaRoutes } from "./routes/media";

export interface AppOptions {
  dispatcher: ActionDispatcher;
  profiles: ProfileManager;
  /** Allowed origins; ["*"] allows any */
  corsOrigins?: string[];
}

/**
 * Create and configure the Hono application
 */
export const createApp = ({ dispatcher, profiles, corsOrigins = ["*"] }: AppOptions) => {
  const app = new Hono();

  app.use(
    "*",
    cors({
      origin: corsOrigins.includes("*") ? "*" : corsOrigins,
      allowMethods: ["GET", "POST", "OPTIONS"],
      allowHeaders: ["Content-Type"],
    })
  );

  app.onError(restErrorHandler);

  app.route("/media", createMediaRoutes(profiles));
  app.route("/", createActionRoutes(dispatcher));

  return app;
};
