import { serve, type ServerType } from "@hono/node-server";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger as honoLogger } from "hono/logger";
import type { ApiConfig } from "../config/api.js";
import { logger } from "../config/logger.js";
import { apiKeyAuth } from "./middleware/security.js";
import { mailboxRoutes } from "./routes/mailboxes.js";
import { messageRoutes } from "./routes/messages.js";
import { routingRoutes } from "./routes/routing.js";

export function createApiApp(config: Pick<ApiConfig, "api" | "env">): Hono {
  const app = new Hono();

  const corsOrigins = config.api.corsOrigins;
  app.use(
    "*",
    cors({
      origin: corsOrigins.includes("*") ? "*" : corsOrigins,
    })
  );
  if (config.env !== "test") {
    app.use("*", honoLogger());
  }
  app.use("/api/*", apiKeyAuth(config));

  app.onError((err, c) => {
    logger.error({ error: err }, "Unhandled API error");
    return c.json({ error: "Internal server error" }, 500);
  });

  app.get("/api/health", (c) => c.json({ status: "ok" }));

  app.route("/api/mailboxes", mailboxRoutes);
  app.route("/api/messages", messageRoutes);
  app.route("/api/routing", routingRoutes);

  app.notFound((c) => c.json({ error: "Not found" }, 404));

  return app;
}

export function startApiServer(app: Hono, config: Pick<ApiConfig, "api">): ServerType {
  return serve(
    {
      fetch: app.fetch,
      port: config.api.port,
      hostname: config.api.host,
    },
    (info) => {
      logger.info(
        { host: config.api.host, port: info.port },
        "API server listening"
      );
    }
  );
}
