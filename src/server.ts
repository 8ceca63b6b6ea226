import "dotenv/config";

import { serve } from "@hono/node-server";

import { parseConfig } from "./config.js";
import app from "./index.js";
import logger from "./logger.js";

const log = logger.child({ module: "server" });

function main(): void {
  const config = parseConfig(process.env);
  if (!config.success) {
    log.error({ issues: config.issues }, "Invalid environment variables");
    process.exit(1);
  }
  const env = config.env;

  log.info(
    { calendarUrl: env.CALENDAR_URL, timezone: env.TIMEZONE ?? "local", logLevel: logger.level },
    "Starting calendar filter service",
  );

  const server = serve(
    {
      port: env.PORT,
      fetch: (request, bindings) =>
        app.fetch(request, env, { remoteAddress: bindings.incoming.socket.remoteAddress }),
    },
    (info) => {
      log.info({ port: info.port }, "Listening");
      log.info(`Filter endpoint: http://localhost:${info.port}/filter`);
    },
  );

  const shutdown = (signal: string) => {
    log.info({ signal }, "Shutting down");
    server.close((error) => {
      if (error) {
        log.error({ err: error }, "Server did not close cleanly");
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main();
