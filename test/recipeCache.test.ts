import test from "node:test";
import assert from "node:assert/strict";
import { openDatabase } from "../src/services/database.js";
import { RecipeCacheService, normalizeRecipeId } from "../src/services/recipeCache.js";
import { SqliteRecipeStore } from "../src/services/recipeStore.js";
import { ProviderError } from "../src/utils/errors.js";
import { FakeProvider, makeDetailedRecipe, makeRecipe } from "./helpers.js";

function setup() {
  const provider = new FakeProvider();
  const store = new SqliteRecipeStore(openDatabase(":memory:"));
  const cache = new RecipeCacheService({ store, provider, batchSize: 2, batchDelayMs: 0 });
  return { provider, store, cache };
}

test("getRecipeDetails serves complete cached recipes without the provider", async () => {
  const { provider, store, cache } = setup();
  await store.upsertMany([makeDetailedRecipe("spoonacular:1", "Beef Stew", "beef")]);

  const recipe = await cache.getRecipeDetails("1");

  assert.equal(recipe?.title, "Beef Stew");
  assert.equal(provider.calls.length, 0);
});

test("getRecipeDetails fetches and caches incomplete recipes", async () => {
  const { provider, store, cache } = setup();
  await store.upsertMany([makeRecipe("spoonacular:2", "Fish Tacos")]);
  provider.details = async (id) => makeDetailedRecipe(id, "Fish Tacos", "cod");

  const recipe = await cache.getRecipeDetails("spoonacular:2");

  assert.equal(recipe?.ingredients[0]?.name, "cod");
  assert.deepEqual(provider.calls, [{ method: "getRecipeDetails", args: ["spoonacular:2"] }]);
  assert.equal(await store.countWithDetails(), 1);
});

test("getRecipeDetails falls back to the cached partial recipe", async () => {
  const { store, cache } = setup();
  await store.upsertMany([makeRecipe("spoonacular:3", "Veggie Burger")]);

  const recipe = await cache.getRecipeDetails("spoonacular:3");
  assert.equal(recipe?.title, "Veggie Burger");
  assert.deepEqual(recipe?.ingredients, []);

  assert.equal(await cache.getRecipeDetails("spoonacular:404"), null);
});

test("prefetchDetails fills in details batch by batch", async () => {
  const { provider, store, cache } = setup();
  const partial = [
    makeRecipe("spoonacular:11", "Soup One"),
    makeRecipe("spoonacular:12", "Soup Two"),
    makeRecipe("spoonacular:13", "Soup Three"),
    makeDetailedRecipe("spoonacular:14", "Soup Four", "leek"),
  ];
  await store.upsertMany(partial);
  provider.details = async (id) => makeDetailedRecipe(id, `Detailed ${id}`, "stock");

  const cached = await cache.prefetchDetails(partial);

  assert.equal(cached, 3);
  assert.equal(provider.calls.length, 3);
  assert.deepEqual(await cache.getCacheStats(), { total: 4, withDetails: 4, basicOnly: 0, cachePercentage: 100 });
});

test("prefetchDetails skips recipes the store already has in full", async () => {
  const { provider, store, cache } = setup();
  await store.upsertMany([makeDetailedRecipe("spoonacular:21", "Stored Stew", "beef")]);

  const cached = await cache.prefetchDetails([makeRecipe("spoonacular:21", "Stored Stew")]);

  assert.equal(cached, 0);
  assert.equal(provider.calls.length, 0);
});

test("quota errors stop nothing and count as not cached", async () => {
  const { provider, store, cache } = setup();
  await store.upsertMany([makeRecipe("spoonacular:31", "Curry"), makeRecipe("spoonacular:32", "Dal")]);
  provider.details = async (id) => {
    if (id === "spoonacular:31") {
      throw new ProviderError("Recipe provider quota exceeded", "quota_exceeded", { status: 402 });
    }
    return makeDetailedRecipe(id, "Dal", "lentils");
  };

  assert.equal(await cache.fillMissingDetails(10), 1);
  assert.deepEqual(await cache.getCacheStats(), { total: 2, withDetails: 1, basicOnly: 1, cachePercentage: 50 });
});

test("remember caches discovery results", async () => {
  const { store, cache } = setup();
  await cache.remember([makeRecipe("spoonacular:41", "Random Risotto")]);
  assert.equal((await store.get("spoonacular:41"))?.title, "Random Risotto");
});

test("remember starts detail caching in the background when enabled", async () => {
  const provider = new FakeProvider();
  const store = new SqliteRecipeStore(openDatabase(":memory:"));
  const cache = new RecipeCacheService({ store, provider, batchSize: 2, batchDelayMs: 0, prefetchOnCache: true });
  provider.details = async (id) => makeDetailedRecipe(id, "Ramen", "noodles");

  await cache.remember([makeRecipe("spoonacular:30", "Ramen"), makeDetailedRecipe("spoonacular:31", "Udon", "udon")]);
  await cache.flush();

  assert.deepEqual(provider.calls, [{ method: "getRecipeDetails", args: ["spoonacular:30"] }]);
  assert.equal((await store.get("spoonacular:30"))?.ingredients[0]?.name, "noodles");
  assert.equal(await store.countWithDetails(), 2);
});

test("remember leaves details to maintenance by default", async () => {
  const { provider, cache } = setup();

  await cache.remember([makeRecipe("spoonacular:32", "Pho")]);
  await cache.flush();

  assert.equal(provider.calls.length, 0);
});

test("getCacheStats reports zeros for an empty cache", async () => {
  const { cache } = setup();
  assert.deepEqual(await cache.getCacheStats(), { total: 0, withDetails: 0, basicOnly: 0, cachePercentage: 0 });
});

test("normalizeRecipeId prefixes bare provider ids only", () => {
  assert.equal(normalizeRecipeId("716429"), "spoonacular:716429");
  assert.equal(normalizeRecipeId("spoonacular:5"), "spoonacular:5");
  assert.equal(normalizeRecipeId("8d0e2a4c-custom"), "8d0e2a4c-custom");
});
