import { setTimeout as sleep } from "node:timers/promises";
import type { CacheStats, Recipe } from "../types/contracts.js";
import { ProviderError } from "../utils/errors.js";
import { createChildLogger, errorMessage, type Logger } from "../utils/logger.js";
import { hasFullDetails, type RecipeCacheStore } from "./recipeStore.js";
import { parseSpoonacularId, toRecipeId, type RecipeDetailsProvider } from "./spoonacular.js";

export type RecipeCacheServiceOptions = {
  store: RecipeCacheStore;
  provider: RecipeDetailsProvider;
  batchSize?: number;
  batchDelayMs?: number;
  /** Start detail caching as soon as new recipes are cached. */
  prefetchOnCache?: boolean;
  logger?: Logger;
};

const DEFAULT_BATCH_SIZE = 3;
const DEFAULT_BATCH_DELAY_MS = 2_000;

/**
 * Serves full recipe details from the cache and fills in details for recipes
 * that were cached from search results without ingredients or steps.
 */
export class RecipeCacheService {
  private readonly store: RecipeCacheStore;
  private readonly provider: RecipeDetailsProvider;
  private readonly batchSize: number;
  private readonly batchDelayMs: number;
  private readonly prefetchOnCache: boolean;
  private readonly log: Logger;
  private readonly inProgress = new Set<string>();
  private readonly background = new Set<Promise<void>>();

  constructor(options: RecipeCacheServiceOptions) {
    this.store = options.store;
    this.provider = options.provider;
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.batchDelayMs = Math.max(0, options.batchDelayMs ?? DEFAULT_BATCH_DELAY_MS);
    this.prefetchOnCache = options.prefetchOnCache ?? false;
    this.log = options.logger ?? createChildLogger({ service: "recipe-cache" });
  }

  async getRecipeDetails(id: string): Promise<Recipe | null> {
    const key = normalizeRecipeId(id);
    const cached = await this.readCached(key);
    if (cached && hasFullDetails(cached)) {
      return cached;
    }

    let recipe: Recipe;
    try {
      recipe = await this.provider.getRecipeDetails(key);
    } catch (error) {
      this.log.warn({ msg: "Failed to fetch recipe details", id: key, error: errorMessage(error) });
      return cached;
    }

    try {
      await this.store.upsertMany([recipe]);
    } catch (error) {
      this.log.warn({ msg: "Failed to cache recipe details", id: key, error: errorMessage(error) });
    }
    return recipe;
  }

  /** Caches recipes returned by discovery endpoints. Failures are logged only. */
  async remember(recipes: readonly Recipe[]): Promise<void> {
    try {
      await this.store.upsertMany(recipes);
    } catch (error) {
      this.log.warn({ msg: "Failed to cache recipes", count: recipes.length, error: errorMessage(error) });
      return;
    }
    this.schedulePrefetch(recipes);
  }

  /** Starts {@link prefetchDetails} in the background when enabled. */
  schedulePrefetch(recipes: readonly Recipe[]): void {
    if (!this.prefetchOnCache || recipes.length === 0) {
      return;
    }

    const task: Promise<void> = this.prefetchDetails(recipes)
      .then(
        (count) => {
          if (count > 0) {
            this.log.debug({ msg: "Prefetched recipe details", count });
          }
        },
        (error: unknown) => {
          this.log.warn({ msg: "Background detail caching failed", error: errorMessage(error) });
        }
      )
      .finally(() => {
        this.background.delete(task);
      });

    this.background.add(task);
  }

  /** Resolves once every background prefetch started so far has settled. */
  async flush(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all(this.background);
    }
  }

  /**
   * Fetches and caches full details for the given recipes in small batches.
   * Resolves with the number of recipes that were cached.
   */
  async prefetchDetails(recipes: readonly Recipe[]): Promise<number> {
    const candidates = recipes.filter((recipe) => !hasFullDetails(recipe) && !this.inProgress.has(recipe.id));
    if (candidates.length === 0) {
      return 0;
    }

    this.log.info({ msg: "Caching recipe details", count: candidates.length });

    let cached = 0;
    for (let start = 0; start < candidates.length; start += this.batchSize) {
      const batch = candidates.slice(start, start + this.batchSize);
      const outcomes = await Promise.all(batch.map((recipe) => this.cacheWithDetails(recipe)));
      cached += outcomes.filter(Boolean).length;

      if (start + this.batchSize < candidates.length && this.batchDelayMs > 0) {
        await sleep(this.batchDelayMs);
      }
    }

    return cached;
  }

  async fillMissingDetails(limit: number = 10): Promise<number> {
    let missing: Recipe[];
    try {
      missing = await this.store.listMissingDetails(limit);
    } catch (error) {
      this.log.error({ msg: "Failed to list recipes missing details", error: errorMessage(error) });
      return 0;
    }

    if (missing.length === 0) {
      return 0;
    }
    return this.prefetchDetails(missing);
  }

  async getCacheStats(): Promise<CacheStats> {
    try {
      const total = await this.store.count();
      const withDetails = await this.store.countWithDetails();
      return {
        total,
        withDetails,
        basicOnly: total - withDetails,
        cachePercentage: total > 0 ? Math.round((withDetails / total) * 100) : 0,
      };
    } catch (error) {
      this.log.error({ msg: "Failed to read cache stats", error: errorMessage(error) });
      return { total: 0, withDetails: 0, basicOnly: 0, cachePercentage: 0 };
    }
  }

  private async cacheWithDetails(recipe: Recipe): Promise<boolean> {
    this.inProgress.add(recipe.id);
    try {
      const current = await this.readCached(recipe.id);
      if (current && hasFullDetails(current)) {
        return false;
      }

      const detailed = await this.provider.getRecipeDetails(recipe.id);
      await this.store.upsertMany([detailed]);
      return true;
    } catch (error) {
      // Quota errors are expected while the daily allowance is used up.
      if (error instanceof ProviderError && error.providerCode === "quota_exceeded") {
        this.log.debug({ msg: "Detail caching paused by provider quota", id: recipe.id });
      } else {
        this.log.warn({ msg: "Failed to cache recipe details", id: recipe.id, error: errorMessage(error) });
      }
      return false;
    } finally {
      this.inProgress.delete(recipe.id);
    }
  }

  private async readCached(id: string): Promise<Recipe | null> {
    try {
      return await this.store.get(id);
    } catch (error) {
      this.log.warn({ msg: "Failed to read cached recipe", id, error: errorMessage(error) });
      return null;
    }
  }
}

/** Bare numeric ids refer to provider recipes. */
export function normalizeRecipeId(id: string): string {
  const numericId = parseSpoonacularId(id);
  return numericId === null ? id : toRecipeId(numericId);
}
