import { logger } from "../logger.js";

function logErr(kind: string, err: unknown): void {
  if (err instanceof Error) {
    logger.error(`${kind}: ${err.message}`, { kind, stack: err.stack });
  } else {
    logger.error(`${kind}: ${String(err)}`, { kind });
  }
}

export function installGlobalErrorHandlers(
  shutdown: (signal: NodeJS.Signals) => Promise<void>
): void {
  process.on("uncaughtException", (err: Error) => {
    logErr("uncaughtException", err);
  });

  process.on("unhandledRejection", (reason: unknown) => {
    logErr("unhandledRejection", reason);
  });

  process.on("warning", (w: Error) => {
    logger.warn(`Process warning: ${w.name}: ${w.message}`, { stack: w.stack });
  });

  const signals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
  for (const sig of signals) {
    process.once(sig, () => {
      logger.info(`Signal received: ${sig}. Shutting down…`);
      shutdown(sig).then(
        () => process.exit(0),
        (err: unknown) => {
          logErr("shutdown", err);
          process.exit(1);
        }
      );
    });
  }
}
