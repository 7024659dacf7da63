import { Hono, type MiddlewareHandler } from "hono";
import { cors } from "hono/cors";
import type { Services } from "../services/services.js";
import { handleError, handleNotFound } from "./errors.js";
import { requestLogger } from "./requestLogger.js";
import { registerCategoryRoutes } from "./routes/categories.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerQuestionRoutes } from "./routes/questions.js";
import { registerQuizRoutes } from "./routes/quizzes.js";

const ALLOW_HEADERS = ["Content-Type", "Authorization", "true"];
const ALLOW_METHODS = ["GET", "PUT", "PATCH", "POST", "DELETE", "OPTIONS"];

/** Sent on every response; hono/cors adds them to preflight answers only. */
const corsAllowHeaders: MiddlewareHandler = async (c, next) => {
  await next();
  c.header("Access-Control-Allow-Headers", ALLOW_HEADERS.join(","));
  c.header("Access-Control-Allow-Methods", ALLOW_METHODS.join(","));
};

export function createApp(services: Services): Hono {
  const app = new Hono();

  app.use("*", requestLogger);
  app.use("*", corsAllowHeaders);
  app.use(
    "*",
    cors({
      origin: "*",
      allowHeaders: ALLOW_HEADERS,
      allowMethods: ALLOW_METHODS,
    })
  );

  registerCategoryRoutes(app, services);
  registerQuestionRoutes(app, services);
  registerQuizRoutes(app, services);
  registerHealthRoutes(app, services);

  app.notFound(handleNotFound);
  app.onError(handleError);

  return app;
}
