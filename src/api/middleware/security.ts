import type { Context, Next } from "hono";
import type { ApiConfig } from "../../config/api.js";

export function apiKeyAuth(config: Pick<ApiConfig, "api">) {
  return async (c: Context, next: Next) => {
    if (!config.api.apiKey) return next();

    if (c.req.path === "/api/health") return next();

    const key =
      c.req.header("x-api-key") ??
      c.req.query("api_key");

    if (key !== config.api.apiKey) {
      return c.json({ error: "Unauthorized" }, 401);
    }

    return next();
  };
}
