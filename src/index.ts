import { config } from "./config.js";
import { logger } from "./logger.js";
import { openDb } from "./db/sqlite.js";
import { seedFromFile } from "./db/seed.js";
import { createServices } from "./services/services.js";
import { createApp } from "./http/app.js";
import { startServer, stopServer } from "./server.js";
import { installGlobalErrorHandlers } from "./infra/global-errors.js";

async function main(): Promise<void> {
  const db = await openDb(config.DB_FILE);
  await seedFromFile(db, config.SEED_FILE);

  const app = createApp(createServices(db));
  const server = startServer(app, config.PORT, config.HOST);

  installGlobalErrorHandlers(async () => {
    await stopServer(server);
    await db.close();
    logger.info("HTTP server and database closed.");
  });
}

main().catch((e: unknown) => {
  logger.error("Startup failed", e instanceof Error ? { stack: e.stack } : { e });
  process.exit(1);
});
