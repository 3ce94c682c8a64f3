import express, { type Express } from "express";
import { getEnv } from "./config/env.js";
import { createHelmet } from "./middleware/helmet.js";
import { createCors } from "./middleware/cors.js";
import { createRateLimiter } from "./middleware/rateLimit.js";
import { requestLogger } from "./middleware/requestLogger.js";
import { errorHandler, notFoundHandler } from "./middleware/error.js";
import { createServices, type Services } from "./services/container.js";
import type { SQLiteDatabase } from "./services/database.js";
import { createHealthRouter } from "./routes/health.js";
import { createV1Router } from "./routes/v1/index.js";

export type AppOptions = {
  db: SQLiteDatabase;
  services?: Services;
};

export function createApp(options: AppOptions): Express {
  const env = getEnv();
  const services =
    options.services ?? createServices(options.db, { searchCaseSensitive: env.SEARCH_CASE_SENSITIVE });

  const app = express();

  app.use(express.json({ limit: "256kb" }));
  app.use(createHelmet());
  app.use(createCors());
  app.use(requestLogger);

  app.use(createHealthRouter(options.db));
  app.use("/api/v1", createRateLimiter(), createV1Router(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
