import { serve } from "@hono/node-server";
import { createApp } from "~/app";
import { loadConfig } from "~/utils/config";
import { logger } from "~/utils/logger";

const config = loadConfig();
const app = createApp(config);

const server = serve(
  { fetch: app.fetch, port: config.PORT, hostname: config.HOST },
  (info) => {
    logger.info("Server listening", {
      action: "startup",
      address: info.address,
      port: info.port,
    });
  },
);

const shutdown = (signal: string) => {
  logger.info("Shutting down", { action: "shutdown", signal });
  server.close((error) => {
    if (error) {
      logger.error("Server close failed", error);
      process.exitCode = 1;
    }
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
