import { createApp } from "./app.js";
import { initEnv } from "./config/env.js";
import { createServices } from "./services/container.js";
import { openDatabase } from "./services/database.js";
import { SpoonacularProvider } from "./services/spoonacular.js";
import { errorMessage, logger } from "./utils/logger.js";

const env = initEnv();

const db = openDatabase(env.RECIPE_DB_PATH);
const services = createServices({
  db,
  provider: new SpoonacularProvider({
    apiKey: env.SPOONACULAR_API_KEY,
    baseURL: env.SPOONACULAR_BASE_URL,
    timeoutMs: env.SPOONACULAR_TIMEOUT_MS,
    maxResults: env.SEARCH_MAX_LIMIT,
  }),
  defaultLimit: env.SEARCH_DEFAULT_LIMIT,
  detailBatchSize: env.CACHE_DETAIL_BATCH_SIZE,
  detailBatchDelayMs: env.CACHE_DETAIL_BATCH_DELAY_MS,
  prefetchDetails: Boolean(env.SPOONACULAR_API_KEY),
  maintenanceIntervalMs: env.CACHE_MAINTENANCE_INTERVAL_MS,
  importOptions: { timeoutMs: env.RECIPE_IMPORT_TIMEOUT_MS },
});

const app = createApp(services);

const server = app.listen(env.PORT, () => {
  logger.info({
    msg: "Server started",
    port: env.PORT,
    environment: env.NODE_ENV,
  });
});

if (env.CACHE_MAINTENANCE_ENABLED && env.SPOONACULAR_API_KEY) {
  services.maintenance.start();
}

let shuttingDown = false;

async function releaseResources(): Promise<void> {
  await services.maintenance.stop();
  await services.search.flush();
  await services.cache.flush();
  db.close();
}

function gracefulShutdown(signal: string) {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;

  logger.info({
    msg: "Graceful shutdown initiated",
    signal,
  });

  server.close((err) => {
    if (err) {
      logger.error({
        msg: "Error during shutdown",
        error: err.message,
      });
      process.exit(1);
    }

    releaseResources().then(
      () => {
        logger.info({ msg: "Server closed gracefully" });
        process.exit(0);
      },
      (error: unknown) => {
        logger.error({ msg: "Failed to release resources", error: errorMessage(error) });
        process.exit(1);
      }
    );
  });

  setTimeout(() => {
    logger.error({
      msg: "Forced shutdown after timeout",
    });
    process.exit(1);
  }, 10000).unref();
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));
