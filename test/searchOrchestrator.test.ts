import test from "node:test";
import assert from "node:assert/strict";
import { openDatabase } from "../src/services/database.js";
import { SqliteRecipeStore } from "../src/services/recipeStore.js";
import {
  CACHED_RESULTS_MESSAGE,
  CANCELLED_MESSAGE,
  NO_RESULTS_MESSAGE,
  SearchOrchestrator,
  UNAVAILABLE_MESSAGE,
} from "../src/services/searchOrchestrator.js";
import { ProviderError, ValidationError } from "../src/utils/errors.js";
import { FakeProvider, MemoryRecipeStore, makeDetailedRecipe, makeRecipe } from "./helpers.js";

test("a live search returns the provider's recipes in order and caches them", async () => {
  const provider = new FakeProvider();
  const store = new SqliteRecipeStore(openDatabase(":memory:"));
  const recipes = [makeRecipe("spoonacular:1", "Pasta Primavera"), makeRecipe("spoonacular:2", "Pasta Carbonara")];
  provider.keyword = async () => recipes;
  const orchestrator = new SearchOrchestrator({ provider, store });

  const result = await orchestrator.search("pasta", { limit: 20 });

  assert.equal(result.provenance, "live");
  assert.equal(result.message, undefined);
  assert.deepEqual(result.recipes, recipes);
  assert.deepEqual(provider.calls, [{ method: "searchByKeyword", args: ["pasta", 20] }]);

  await orchestrator.flush();
  assert.equal((await store.get("spoonacular:1"))?.title, "Pasta Primavera");
  assert.equal((await store.get("spoonacular:2"))?.title, "Pasta Carbonara");
});

test("a provider timeout falls back to cached title matches", async () => {
  const provider = new FakeProvider();
  const store = new SqliteRecipeStore(openDatabase(":memory:"));
  await store.upsertMany([makeRecipe("spoonacular:7", "Cheesy Pizza"), makeRecipe("spoonacular:8", "Garden Salad")]);
  provider.keyword = async () => {
    throw new ProviderError("Recipe provider timed out after 10000ms", "timeout");
  };
  const orchestrator = new SearchOrchestrator({ provider, store });

  const result = await orchestrator.search("pizza", { limit: 20 });

  assert.equal(result.provenance, "cached");
  assert.equal(result.message, CACHED_RESULTS_MESSAGE);
  assert.deepEqual(result.recipes.map((recipe) => recipe.title), ["Cheesy Pizza"]);
});

test("a failed search with no cached match is empty with a hint", async () => {
  const provider = new FakeProvider();
  const store = new SqliteRecipeStore(openDatabase(":memory:"));
  await store.upsertMany([makeRecipe("spoonacular:7", "Cheesy Pizza")]);
  const orchestrator = new SearchOrchestrator({ provider, store });

  const result = await orchestrator.search("xyzzy", { limit: 20 });

  assert.deepEqual(result, { recipes: [], provenance: "empty", message: NO_RESULTS_MESSAGE });
  assert.equal(NO_RESULTS_MESSAGE, "No recipes found. Try a different search term.");
});

test("empty queries are rejected before any I/O", () => {
  const provider = new FakeProvider();
  const store = new MemoryRecipeStore();
  const orchestrator = new SearchOrchestrator({ provider, store });

  assert.throws(() => orchestrator.search(""), ValidationError);
  assert.throws(() => orchestrator.search("   "), ValidationError);
  assert.throws(() => orchestrator.search([]), ValidationError);
  assert.throws(() => orchestrator.search(["", "  "]), ValidationError);

  assert.equal(provider.calls.length, 0);
  assert.equal(store.upsertCalls, 0);
});

test("limits outside 1..maxResults are rejected", () => {
  const provider = new FakeProvider(100);
  const orchestrator = new SearchOrchestrator({ provider, store: new MemoryRecipeStore() });

  assert.throws(() => orchestrator.search("soup", { limit: 0 }), /between 1 and 100/);
  assert.throws(() => orchestrator.search("soup", { limit: 101 }), ValidationError);
  assert.throws(() => orchestrator.search("soup", { limit: 2.5 }), ValidationError);
  assert.equal(provider.calls.length, 0);
});

test("the default limit is 20 and the query is trimmed", async () => {
  const provider = new FakeProvider();
  provider.keyword = async () => [];
  const orchestrator = new SearchOrchestrator({ provider, store: new MemoryRecipeStore() });

  await orchestrator.search("  soup  ");
  assert.deepEqual(provider.calls[0]?.args, ["soup", 20]);
});

test("an empty live result is still live and writes nothing", async () => {
  const provider = new FakeProvider();
  const store = new MemoryRecipeStore();
  provider.keyword = async () => [];
  const orchestrator = new SearchOrchestrator({ provider, store });

  const result = await orchestrator.search("nothing-matches");
  await orchestrator.flush();

  assert.deepEqual(result, { recipes: [], provenance: "live" });
  assert.equal(store.upsertCalls, 0);
});

test("live results beyond the limit are dropped", async () => {
  const provider = new FakeProvider();
  provider.keyword = async () => [makeRecipe("a", "Soup A"), makeRecipe("b", "Soup B"), makeRecipe("c", "Soup C")];
  const orchestrator = new SearchOrchestrator({ provider, store: new MemoryRecipeStore() });

  const result = await orchestrator.search("soup", { limit: 2 });
  assert.deepEqual(result.recipes.map((recipe) => recipe.id), ["a", "b"]);
});

test("a slow store does not delay the live response", async () => {
  const provider = new FakeProvider();
  const store = new MemoryRecipeStore();
  store.writeDelayMs = 400;
  provider.keyword = async () => [makeRecipe("spoonacular:1", "Slow Roast"), makeRecipe("spoonacular:2", "Slow Cooker Chili")];
  const orchestrator = new SearchOrchestrator({ provider, store });

  const started = performance.now();
  const result = await orchestrator.search("slow");
  const elapsed = performance.now() - started;

  assert.equal(result.provenance, "live");
  assert.ok(elapsed < 200, `search took ${elapsed}ms`);
  assert.equal(store.records.size, 0);
  assert.equal(orchestrator.pendingWriteCount, 1);

  await orchestrator.flush();
  assert.deepEqual([...store.records.keys()].sort(), ["spoonacular:1", "spoonacular:2"]);
  assert.equal(orchestrator.pendingWriteCount, 0);
});

test("a failed write-through is swallowed", async () => {
  const provider = new FakeProvider();
  const store = new MemoryRecipeStore();
  store.failWrites = true;
  provider.keyword = async () => [makeRecipe("spoonacular:1", "Bean Stew")];
  const orchestrator = new SearchOrchestrator({ provider, store });

  const result = await orchestrator.search("stew");
  await orchestrator.flush();

  assert.equal(result.provenance, "live");
  assert.equal(store.upsertCalls, 1);
  assert.equal(store.records.size, 0);
});

test("onCached hears about results only once they are stored", async () => {
  const provider = new FakeProvider();
  const store = new MemoryRecipeStore();
  const cached: string[][] = [];
  provider.keyword = async () => [makeRecipe("spoonacular:1", "Bean Stew")];
  const orchestrator = new SearchOrchestrator({
    provider,
    store,
    onCached: (recipes) => cached.push(recipes.map((recipe) => recipe.id)),
  });

  await orchestrator.search("stew");
  assert.deepEqual(cached, []);
  await orchestrator.flush();
  assert.deepEqual(cached, [["spoonacular:1"]]);

  store.failWrites = true;
  await orchestrator.search("stew");
  await orchestrator.flush();
  assert.deepEqual(cached, [["spoonacular:1"]]);
});

test("ingredient searches fall back to cached ingredient matches", async () => {
  const provider = new FakeProvider();
  const store = new MemoryRecipeStore();
  await store.upsertMany([
    makeDetailedRecipe("r1", "Egg Fried Rice", "rice"),
    makeDetailedRecipe("r2", "Tomato Salad", "tomato"),
    makeDetailedRecipe("r3", "Pancakes", "flour"),
  ]);
  const orchestrator = new SearchOrchestrator({ provider, store });

  const result = await orchestrator.search([" Tomato ", "rice"], { limit: 5 });

  assert.deepEqual(provider.calls, [{ method: "searchByIngredients", args: [["Tomato", "rice"], 5] }]);
  assert.equal(result.provenance, "cached");
  assert.deepEqual(result.recipes.map((recipe) => recipe.id), ["r1", "r2"]);
});

test("a failing fallback read becomes an empty result", async () => {
  const provider = new FakeProvider();
  const store = new MemoryRecipeStore();
  store.failReads = true;
  const orchestrator = new SearchOrchestrator({ provider, store });

  const result = await orchestrator.search("soup");
  assert.deepEqual(result, { recipes: [], provenance: "empty", message: UNAVAILABLE_MESSAGE });
});

test("a failing fallback read for an ingredient search becomes an empty result", async () => {
  const provider = new FakeProvider();
  const store = new MemoryRecipeStore();
  store.failReads = true;
  const orchestrator = new SearchOrchestrator({ provider, store });

  const result = await orchestrator.search(["egg", "leek"]);
  assert.deepEqual(result, { recipes: [], provenance: "empty", message: UNAVAILABLE_MESSAGE });
  assert.deepEqual(provider.calls, [{ method: "searchByIngredients", args: [["egg", "leek"], 20] }]);
});

test("a cancelled search neither falls back nor caches", async () => {
  const provider = new FakeProvider();
  const store = new MemoryRecipeStore();
  await store.upsertMany([makeRecipe("r1", "Mushroom Soup")]);
  provider.keyword = (_text, _limit, signal) =>
    new Promise((_resolve, reject) => {
      signal?.addEventListener("abort", () => reject(new ProviderError("Request cancelled", "cancelled")));
    });
  const orchestrator = new SearchOrchestrator({ provider, store });
  const controller = new AbortController();

  const pending = orchestrator.search("soup", { signal: controller.signal });
  controller.abort();
  const result = await pending;

  assert.deepEqual(result, { recipes: [], provenance: "empty", message: CANCELLED_MESSAGE });
  assert.equal(store.upsertCalls, 1);
});

test("results that arrive after cancellation are not cached", async () => {
  const provider = new FakeProvider();
  const store = new MemoryRecipeStore();
  provider.keyword = async () => [makeRecipe("r9", "Late Lasagna")];
  const orchestrator = new SearchOrchestrator({ provider, store });
  const controller = new AbortController();

  const pending = orchestrator.search("lasagna", { signal: controller.signal });
  controller.abort();
  const result = await pending;
  await orchestrator.flush();

  assert.equal(result.message, CANCELLED_MESSAGE);
  assert.equal(store.upsertCalls, 0);
});
