/**
 * DeckBridge Backend
 *
 * Entry point: resolves the configuration, opens the default profile and
 * serves the action API with @hono/node-server.
 */

import { serve } from "@hono/node-server";
import { ActionDispatcher } from "./action-dispatcher";
import { createActionRegistry } from "./handlers";
import { ProfileManager } from "./host/profile-manager";
import { serverLog as log, setLogLevel } from "./logger";
import { createApp } from "./server";
import { loadServerConfig } from "./server-config";

async function main(): Promise<void> {
  const config = await loadServerConfig();
  setLogLevel(config.logLevel);
  const profiles = new ProfileManager({ dataDir: config.dataDir });
  await profiles.openOrCreate(config.defaultProfile);

  const dispatcher = new ActionDispatcher({
    registry: createActionRegistry(),
    profiles,
    apiKey: config.apiKey,
  });
  const app = createApp({ dispatcher, profiles, corsOrigins: config.corsOrigins });

  const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
    log.info(`DeckBridge running at http://${config.host}:${info.port}`);
    log.info(`Data directory: ${config.dataDir}`);
    if (config.apiKey) {
      log.info("API key required for action requests");
    }
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, saving and shutting down`);
    server.close();
    dispatcher
      .runExclusive(() => profiles.close())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error("Failed to save the collection on shutdown", error);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  log.error("Failed to start", error);
  process.exit(1);
});
