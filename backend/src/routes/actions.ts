/**
 * Action Routes
 *
 * The JSON action endpoint:
 * - POST / - Run an action request and return its reply
 * - GET /  - Version banner (health check)
 *
 * An empty POST body also gets the banner; a body that is not JSON gets
 * `null`.
 */

import { Hono } from "hono";
import { API_VERSION } from "@deckbridge/shared";
import type { ActionDispatcher } from "../action-dispatcher";
import { createLogger } from "../logger";

const log = createLogger("ActionRoutes");

export const BANNER = `DeckBridge v.${API_VERSION}`;

function jsonBody(payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    headers: { "Content-Type": "application/json" },
  });
}

export function createActionRoutes(dispatcher: ActionDispatcher): Hono {
  const routes = new Hono();

  routes.get("/", (c) => c.text(BANNER));

  routes.post("/", async (c) => {
    const raw = await c.req.text();
    if (raw.length === 0) {
      return c.text(BANNER);
    }

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (error) {
      log.warn(`Request body is not JSON: ${error instanceof Error ? error.message : String(error)}`);
      return jsonBody(null);
    }

    return jsonBody(await dispatcher.handle(body));
  });

  return routes;
}
