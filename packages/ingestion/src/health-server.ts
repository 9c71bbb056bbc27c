import express, { type Express } from "express";
import type { Server } from "node:http";
import { errorFields, logEvent } from "../../core/src/observability/logger.ts";

export const HEALTH_BODY = "Bot is running!";

export function createHealthApp(): Express {
  const app = express();
  app.disable("x-powered-by");

  app.get("/", (_req, res) => {
    res.status(200).type("text/plain").send(HEALTH_BODY);
  });

  return app;
}

/** Binds the health endpoint. A bind failure is logged; polling does not depend on it. */
export function startHealthServer(port: number): Server {
  const server = createHealthApp().listen(port, "0.0.0.0");
  server.on("error", (error) => {
    logEvent({
      event: "system.unhandled_error",
      level: "error",
      payload: { phase: "health_server", port, ...errorFields(error) },
    });
  });
  return server;
}
