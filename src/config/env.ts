import { z } from "zod";

const booleanFlag = (fallback: "true" | "false") =>
  z.string().transform((val) => val !== "false" && val !== "0").default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().min(1).max(65535).default(8080),

  // Storage
  RECIPE_DB_PATH: z.string().default("data/recipes.sqlite"),

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().default(120),

  // CORS
  CORS_ORIGIN: z.string().default("*"),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  LOG_PRETTY: booleanFlag("true"),

  // Recipe provider
  SPOONACULAR_API_KEY: z.string().optional(),
  SPOONACULAR_BASE_URL: z.string().url().default("https://api.spoonacular.com"),
  SPOONACULAR_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // Search
  SEARCH_DEFAULT_LIMIT: z.coerce.number().int().positive().default(20),
  SEARCH_MAX_LIMIT: z.coerce.number().int().positive().default(100),

  // Background detail caching
  CACHE_MAINTENANCE_ENABLED: booleanFlag("true"),
  CACHE_MAINTENANCE_INTERVAL_MS: z.coerce.number().int().positive().default(5 * 60_000),
  CACHE_DETAIL_BATCH_SIZE: z.coerce.number().int().positive().default(3),
  CACHE_DETAIL_BATCH_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),

  // URL import
  RECIPE_IMPORT_TIMEOUT_MS: z.coerce.number().int().positive().default(8_000),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | undefined;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  return result.data;
}

export function getEnv(): Env {
  if (env) {
    return env;
  }

  env = parseEnv(process.env);
  return env;
}

export function initEnv(): Env {
  const e = getEnv();

  if (e.NODE_ENV === "development") {
    console.log("Running in development mode");
    console.log("Port:", e.PORT);
    if (!e.SPOONACULAR_API_KEY) {
      console.log("SPOONACULAR_API_KEY is not set, searches will use cached recipes only");
    }
  }

  return e;
}
