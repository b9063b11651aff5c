import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Express } from "express";
import type { RecipeProvider } from "../src/services/container.js";
import type { LocalRecipeStore } from "../src/services/recipeStore.js";
import type { Recipe } from "../src/types/contracts.js";
import { ProviderError } from "../src/utils/errors.js";

export function makeRecipe(id: string, title: string, overrides: Partial<Recipe> = {}): Recipe {
  return {
    id,
    title,
    ingredients: [],
    instructions: [],
    vegetarian: false,
    vegan: false,
    glutenFree: false,
    dairyFree: false,
    ...overrides,
  };
}

export function makeDetailedRecipe(id: string, title: string, ingredient: string): Recipe {
  return makeRecipe(id, title, {
    ingredients: [{ original: ingredient, name: ingredient }],
    instructions: [{ number: 1, step: `Cook the ${ingredient}.` }],
  });
}

type ProviderCall = { method: string; args: unknown[] };

/** Provider stand-in. Each hook defaults to an unavailable provider. */
export class FakeProvider implements RecipeProvider {
  readonly maxResults: number;
  readonly calls: ProviderCall[] = [];

  keyword: (text: string, limit: number, signal?: AbortSignal) => Promise<Recipe[]> = unavailable;
  ingredients: (names: readonly string[], limit: number, signal?: AbortSignal) => Promise<Recipe[]> = unavailable;
  details: (id: string) => Promise<Recipe> = unavailable;
  random: (count: number) => Promise<Recipe[]> = unavailable;
  similar: (id: string, count: number) => Promise<Recipe[]> = unavailable;

  constructor(maxResults: number = 100) {
    this.maxResults = maxResults;
  }

  searchByKeyword(text: string, limit: number, signal?: AbortSignal): Promise<Recipe[]> {
    this.calls.push({ method: "searchByKeyword", args: [text, limit] });
    return this.keyword(text, limit, signal);
  }

  searchByIngredients(names: readonly string[], limit: number, signal?: AbortSignal): Promise<Recipe[]> {
    this.calls.push({ method: "searchByIngredients", args: [[...names], limit] });
    return this.ingredients(names, limit, signal);
  }

  getRecipeDetails(id: string): Promise<Recipe> {
    this.calls.push({ method: "getRecipeDetails", args: [id] });
    return this.details(id);
  }

  getRandomRecipes(count: number): Promise<Recipe[]> {
    this.calls.push({ method: "getRandomRecipes", args: [count] });
    return this.random(count);
  }

  getSimilarRecipes(id: string, count: number): Promise<Recipe[]> {
    this.calls.push({ method: "getSimilarRecipes", args: [id, count] });
    return this.similar(id, count);
  }
}

async function unavailable(): Promise<never> {
  throw new ProviderError("Failed to reach recipe provider", "network_error");
}

/** In-memory store with optional write delay and failure injection. */
export class MemoryRecipeStore implements LocalRecipeStore {
  readonly records = new Map<string, Recipe>();
  upsertCalls = 0;
  writeDelayMs = 0;
  failWrites = false;
  failReads = false;

  async upsertMany(recipes: readonly Recipe[]): Promise<void> {
    this.upsertCalls += 1;
    if (this.writeDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.writeDelayMs));
    }
    if (this.failWrites) {
      throw new Error("disk full");
    }
    // Reinsert so the newest batch reads first, earlier batch entries ahead.
    for (const recipe of [...recipes].reverse()) {
      this.records.delete(recipe.id);
      this.records.set(recipe.id, recipe);
    }
  }

  async findByTitleSubstring(text: string, limit: number): Promise<Recipe[]> {
    if (this.failReads) {
      throw new Error("store offline");
    }
    const needle = text.toLowerCase();
    return this.newestFirst().filter((recipe) => recipe.title.toLowerCase().includes(needle)).slice(0, limit);
  }

  async findByIngredients(names: readonly string[], limit: number): Promise<Recipe[]> {
    if (this.failReads) {
      throw new Error("store offline");
    }
    const needles = names.map((name) => name.toLowerCase());
    return this.newestFirst()
      .filter((recipe) =>
        recipe.ingredients.some((ingredient) => needles.some((needle) => ingredient.original.toLowerCase().includes(needle)))
      )
      .slice(0, limit);
  }

  private newestFirst(): Recipe[] {
    return [...this.records.values()].reverse();
  }
}

/** A clock that advances one second per call. */
export function steppingClock(start: string = "2024-03-01T10:00:00.000Z"): () => Date {
  let current = new Date(start).getTime();
  return () => {
    const now = new Date(current);
    current += 1_000;
    return now;
  };
}

export async function withServer<T>(app: Express, run: (baseURL: string) => Promise<T>): Promise<T> {
  const server = await new Promise<Server>((resolve, reject) => {
    const instance = app.listen(0, () => resolve(instance));
    instance.on("error", reject);
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    throw new Error("Failed to resolve test server address");
  }

  const baseURL = `http://127.0.0.1:${(address satisfies AddressInfo).port}`;
  try {
    return await run(baseURL);
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

export async function readJSON<T>(response: Response): Promise<T> {
  return (await response.json()) as T;
}
