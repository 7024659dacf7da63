import type { MiddlewareHandler } from "hono";
import { logger } from "../logger.js";

export const requestLogger: MiddlewareHandler = async (c, next) => {
  const started: number = Date.now();
  await next();
  const ms: number = Date.now() - started;
  logger.info(`${c.req.method} ${c.req.path} ${c.res.status} ${ms}ms`);
};
