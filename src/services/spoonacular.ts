import { z } from "zod";
import type { Ingredient, InstructionStep, Recipe } from "../types/contracts.js";
import { ProviderError, isAbortError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

/**
 * Network recipe search. Implementations reject with {@link ProviderError} on
 * any transport or parse problem, including their own timeout.
 */
export interface RemoteRecipeProvider {
  readonly maxResults: number;
  searchByKeyword(text: string, limit: number, signal?: AbortSignal): Promise<Recipe[]>;
  searchByIngredients(names: readonly string[], limit: number, signal?: AbortSignal): Promise<Recipe[]>;
}

export interface RecipeDetailsProvider {
  getRecipeDetails(id: string, signal?: AbortSignal): Promise<Recipe>;
}

export interface RecipeDiscoveryProvider {
  getRandomRecipes(count: number, signal?: AbortSignal): Promise<Recipe[]>;
  getSimilarRecipes(id: string, count: number, signal?: AbortSignal): Promise<Recipe[]>;
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type SpoonacularOptions = {
  apiKey?: string;
  baseURL?: string;
  timeoutMs?: number;
  /** Capped at the provider's own page size of 100. */
  maxResults?: number;
  fetchImpl?: FetchLike;
};

const DEFAULT_BASE_URL = "https://api.spoonacular.com";
const DEFAULT_TIMEOUT_MS = 10_000;
const MAX_RESULTS = 100;
const ID_PREFIX = "spoonacular:";

const log = createChildLogger({ service: "spoonacular" });

// ── response schemas ───────────────────────────────────────────────────────

const ingredientPayload = z.object({
  id: z.number().nullish(),
  name: z.string().nullish(),
  original: z.string().nullish(),
  amount: z.number().nullish(),
  unit: z.string().nullish(),
});

const recipePayload = z.object({
  id: z.number().int(),
  title: z.string().nullish(),
  image: z.string().nullish(),
  imageType: z.string().nullish(),
  readyInMinutes: z.number().nullish(),
  servings: z.number().nullish(),
  summary: z.string().nullish(),
  sourceUrl: z.string().nullish(),
  vegetarian: z.boolean().nullish(),
  vegan: z.boolean().nullish(),
  glutenFree: z.boolean().nullish(),
  dairyFree: z.boolean().nullish(),
  extendedIngredients: z.array(ingredientPayload).nullish(),
  analyzedInstructions: z
    .array(
      z.object({
        steps: z.array(z.object({ number: z.number().nullish(), step: z.string().nullish() })).nullish(),
      })
    )
    .nullish(),
  usedIngredientCount: z.number().int().nullish(),
  missedIngredientCount: z.number().int().nullish(),
  usedIngredients: z.array(ingredientPayload).nullish(),
  missedIngredients: z.array(ingredientPayload).nullish(),
});

type RecipePayload = z.infer<typeof recipePayload>;

const complexSearchPayload = z.object({ results: z.array(recipePayload) });
const randomPayload = z.object({ recipes: z.array(recipePayload) });
const recipeListPayload = z.array(recipePayload);

export class SpoonacularProvider implements RemoteRecipeProvider, RecipeDetailsProvider, RecipeDiscoveryProvider {
  readonly maxResults: number;

  private readonly apiKey?: string;
  private readonly baseURL: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: SpoonacularOptions = {}) {
    this.apiKey = options.apiKey;
    this.baseURL = options.baseURL ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxResults = Math.max(1, Math.min(options.maxResults ?? MAX_RESULTS, MAX_RESULTS));
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async searchByKeyword(text: string, limit: number, signal?: AbortSignal): Promise<Recipe[]> {
    const data = await this.request(
      "/recipes/complexSearch",
      {
        query: text,
        number: String(this.clamp(limit)),
        addRecipeInformation: "true",
        fillIngredients: "true",
      },
      complexSearchPayload,
      signal
    );

    return mapRecipes(data.results);
  }

  async searchByIngredients(names: readonly string[], limit: number, signal?: AbortSignal): Promise<Recipe[]> {
    const data = await this.request(
      "/recipes/findByIngredients",
      {
        ingredients: names.join(","),
        number: String(this.clamp(limit)),
        // 2 = minimize missing ingredients
        ranking: "2",
        ignorePantry: "true",
      },
      recipeListPayload,
      signal
    );

    return mapRecipes(data);
  }

  async getRecipeDetails(id: string, signal?: AbortSignal): Promise<Recipe> {
    const numericId = parseSpoonacularId(id);
    if (numericId === null) {
      throw new ProviderError(`Unknown recipe id ${id}`, "http_error", { status: 404 });
    }

    const data = await this.request(
      `/recipes/${numericId}/information`,
      { includeNutrition: "false" },
      recipePayload,
      signal
    );

    const recipe = mapRecipe(data);
    if (!recipe) {
      throw new ProviderError(`Recipe ${id} has no title`, "malformed_response");
    }
    return recipe;
  }

  async getRandomRecipes(count: number, signal?: AbortSignal): Promise<Recipe[]> {
    const data = await this.request(
      "/recipes/random",
      { number: String(this.clamp(count)) },
      randomPayload,
      signal
    );
    return mapRecipes(data.recipes);
  }

  async getSimilarRecipes(id: string, count: number, signal?: AbortSignal): Promise<Recipe[]> {
    const numericId = parseSpoonacularId(id);
    if (numericId === null) {
      return [];
    }

    const data = await this.request(
      `/recipes/${numericId}/similar`,
      { number: String(this.clamp(count)) },
      recipeListPayload,
      signal
    );
    return mapRecipes(data);
  }

  private clamp(limit: number): number {
    return Math.max(1, Math.min(Math.floor(limit), this.maxResults));
  }

  private async request<T>(
    path: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal
  ): Promise<T> {
    if (!this.apiKey) {
      throw new ProviderError("Recipe provider API key is not configured", "not_configured");
    }
    if (signal?.aborted) {
      throw new ProviderError("Request cancelled", "cancelled");
    }

    const url = new URL(path, this.baseURL);
    url.searchParams.set("apiKey", this.apiKey);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    let body: unknown;
    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: { Accept: "application/json" },
        signal: controller.signal,
      });

      if (response.status === 402 || response.status === 429) {
        throw new ProviderError("Recipe provider quota exceeded", "quota_exceeded", { status: response.status });
      }
      if (!response.ok) {
        throw new ProviderError(`Recipe provider responded with ${response.status}`, "http_error", {
          status: response.status,
        });
      }

      try {
        body = await response.json();
      } catch (error) {
        // The body read fails the same way the request does when aborted.
        if (timedOut || isAbortError(error)) {
          throw error;
        }
        throw new ProviderError("Recipe provider returned invalid JSON", "malformed_response", { cause: error });
      }
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      if (timedOut) {
        throw new ProviderError(`Recipe provider timed out after ${this.timeoutMs}ms`, "timeout", { cause: error });
      }
      if (isAbortError(error)) {
        throw new ProviderError("Request cancelled", "cancelled", { cause: error });
      }
      throw new ProviderError("Failed to reach recipe provider", "network_error", { cause: error });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      log.warn({ msg: "Unexpected provider payload", path, issues: parsed.error.issues.slice(0, 5) });
      throw new ProviderError("Recipe provider returned an unexpected payload", "malformed_response", {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}

export function toRecipeId(numericId: number): string {
  return `${ID_PREFIX}${numericId}`;
}

/** Accepts either "716429" or "spoonacular:716429". */
export function parseSpoonacularId(id: string): number | null {
  const raw = id.startsWith(ID_PREFIX) ? id.slice(ID_PREFIX.length) : id;
  if (!/^\d+$/.test(raw)) {
    return null;
  }
  return Number(raw);
}

function mapRecipes(payloads: RecipePayload[]): Recipe[] {
  return payloads
    .map((payload) => mapRecipe(payload))
    .filter((recipe): recipe is Recipe => recipe !== null);
}

function mapRecipe(payload: RecipePayload): Recipe | null {
  const title = payload.title?.trim();
  if (!title) {
    return null;
  }

  const hasMatchInfo = payload.usedIngredientCount != null || payload.missedIngredientCount != null;
  const ingredients = payload.extendedIngredients
    ?? [...(payload.usedIngredients ?? []), ...(payload.missedIngredients ?? [])];

  return {
    id: toRecipeId(payload.id),
    title,
    imageUrl: payload.image ?? imageFromType(payload.id, payload.imageType),
    readyInMinutes: positiveInt(payload.readyInMinutes),
    servings: positiveInt(payload.servings),
    summary: payload.summary ?? undefined,
    sourceUrl: payload.sourceUrl ?? undefined,
    ingredients: ingredients
      .map(mapIngredient)
      .filter((ingredient): ingredient is Ingredient => ingredient !== null),
    instructions: mapInstructions(payload.analyzedInstructions),
    vegetarian: payload.vegetarian ?? false,
    vegan: payload.vegan ?? false,
    glutenFree: payload.glutenFree ?? false,
    dairyFree: payload.dairyFree ?? false,
    ingredientMatch: hasMatchInfo
      ? {
          usedIngredientCount: Math.max(0, payload.usedIngredientCount ?? 0),
          missedIngredientCount: Math.max(0, payload.missedIngredientCount ?? 0),
        }
      : undefined,
  };
}

function mapIngredient(payload: z.infer<typeof ingredientPayload>): Ingredient | null {
  const original = payload.original?.trim() || payload.name?.trim();
  if (!original) {
    return null;
  }

  return {
    original,
    name: payload.name?.trim() || undefined,
    amount: payload.amount != null && payload.amount >= 0 ? payload.amount : undefined,
    unit: payload.unit?.trim() || undefined,
  };
}

// Sections are flattened and renumbered so step numbers run 1..n.
function mapInstructions(sections: RecipePayload["analyzedInstructions"]): InstructionStep[] {
  const texts = (sections ?? [])
    .flatMap((section) => section.steps ?? [])
    .map((step) => step.step?.trim() ?? "")
    .filter((text) => text.length > 0);

  return texts.map((step, index) => ({ number: index + 1, step }));
}

function imageFromType(id: number, imageType: string | null | undefined): string | undefined {
  if (!imageType) {
    return undefined;
  }
  return `https://img.spoonacular.com/recipes/${id}-556x370.${imageType}`;
}

function positiveInt(value: number | null | undefined): number | undefined {
  if (value == null || !Number.isFinite(value)) {
    return undefined;
  }
  const rounded = Math.round(value);
  return rounded > 0 ? rounded : undefined;
}
