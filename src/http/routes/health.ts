import type { Hono } from "hono";
import type { Services } from "../../services/services.js";
import { methodNotAllowed } from "../errors.js";

export function registerHealthRoutes(app: Hono, services: Services): void {
  app.get("/health", async (c) => {
    const counts = await services.healthService.check();
    return c.json({ success: true, status: "ok", ...counts });
  });
  app.all("/health", methodNotAllowed);
}
