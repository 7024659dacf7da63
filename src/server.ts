import { serve, type ServerType } from "@hono/node-server";
import type { Hono } from "hono";
import { logger } from "./logger.js";

export function startServer(app: Hono, port: number, hostname: string): ServerType {
  return serve({ fetch: app.fetch, port, hostname }, (info) => {
    logger.info(`Trivia API listening on http://${info.address}:${info.port}`);
  });
}

export function stopServer(server: ServerType): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((err?: Error) => (err ? reject(err) : resolve()));
  });
}
