import express, { type Express } from "express";
import { createCors } from "./middleware/cors.js";
import { errorHandler, notFoundHandler } from "./middleware/error.js";
import { createHelmet } from "./middleware/helmet.js";
import { createRateLimiter } from "./middleware/rateLimit.js";
import { createHealthRouter } from "./routes/health.js";
import { createV1Router } from "./routes/v1/index.js";
import type { AppServices } from "./services/container.js";
import { logger } from "./utils/logger.js";

declare global {
  namespace Express {
    interface Request {
      requestTime?: number;
    }
  }
}

export function createApp(services: AppServices): Express {
  const app = express();

  app.use(express.json({ limit: "256kb" }));

  app.use(createHelmet());
  app.use(createCors());

  app.use((req, res, next) => {
    req.requestTime = Date.now();
    res.on("finish", () => {
      logger.info({
        msg: "Request completed",
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - (req.requestTime ?? Date.now()),
      });
    });
    next();
  });

  app.use(createHealthRouter(services.db));
  app.use("/api/v1", createRateLimiter(), createV1Router(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
