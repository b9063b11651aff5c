import test from "node:test";
import assert from "node:assert/strict";
import { parseEnv } from "../src/config/env.js";

test("parseEnv applies defaults for an empty environment", () => {
  const env = parseEnv({});

  assert.equal(env.NODE_ENV, "development");
  assert.equal(env.PORT, 8080);
  assert.equal(env.RECIPE_DB_PATH, "data/recipes.sqlite");
  assert.equal(env.SEARCH_DEFAULT_LIMIT, 20);
  assert.equal(env.SEARCH_MAX_LIMIT, 100);
  assert.equal(env.LOG_PRETTY, true);
  assert.equal(env.CACHE_MAINTENANCE_ENABLED, true);
  assert.equal(env.SPOONACULAR_API_KEY, undefined);
});

test("parseEnv coerces numbers and boolean flags", () => {
  const env = parseEnv({
    PORT: "3000",
    LOG_PRETTY: "false",
    CACHE_MAINTENANCE_ENABLED: "0",
    SPOONACULAR_API_KEY: "test-secret",
    CACHE_DETAIL_BATCH_DELAY_MS: "0",
  });

  assert.equal(env.PORT, 3000);
  assert.equal(env.LOG_PRETTY, false);
  assert.equal(env.CACHE_MAINTENANCE_ENABLED, false);
  assert.equal(env.SPOONACULAR_API_KEY, "test-secret");
  assert.equal(env.CACHE_DETAIL_BATCH_DELAY_MS, 0);
});

test("parseEnv rejects an invalid port", () => {
  assert.throws(() => parseEnv({ PORT: "not-a-port" }), /Invalid environment configuration/);
});
