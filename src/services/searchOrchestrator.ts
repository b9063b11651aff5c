import type { Recipe, SearchOptions, SearchQuery, SearchResult } from "../types/contracts.js";
import { ValidationError } from "../utils/errors.js";
import { createChildLogger, errorMessage, type Logger } from "../utils/logger.js";
import type { LocalRecipeStore } from "./recipeStore.js";
import type { RemoteRecipeProvider } from "./spoonacular.js";

export const NO_RESULTS_MESSAGE = "No recipes found. Try a different search term.";
export const CACHED_RESULTS_MESSAGE = "Showing cached results";
export const UNAVAILABLE_MESSAGE = "Recipes are unavailable right now. Please try again later.";
export const CANCELLED_MESSAGE = "Search cancelled.";

const DEFAULT_LIMIT = 20;

type NormalizedQuery =
  | { kind: "keyword"; text: string }
  | { kind: "ingredients"; names: string[] };

export type SearchOrchestratorOptions = {
  provider: RemoteRecipeProvider;
  store: LocalRecipeStore;
  defaultLimit?: number;
  /** Called after live results have been written to the store. */
  onCached?: (recipes: readonly Recipe[]) => void;
  logger?: Logger;
};

/**
 * Runs a recipe search against the live provider and falls back to the local
 * store when the provider fails. Live results are written through to the
 * store without delaying the response.
 */
export class SearchOrchestrator {
  private readonly provider: RemoteRecipeProvider;
  private readonly store: LocalRecipeStore;
  private readonly defaultLimit: number;
  private readonly onCached?: (recipes: readonly Recipe[]) => void;
  private readonly log: Logger;
  private readonly pendingWrites = new Set<Promise<void>>();

  constructor(options: SearchOrchestratorOptions) {
    this.provider = options.provider;
    this.store = options.store;
    this.defaultLimit = Math.min(options.defaultLimit ?? DEFAULT_LIMIT, options.provider.maxResults);
    this.onCached = options.onCached;
    this.log = options.logger ?? createChildLogger({ service: "search" });
  }

  /**
   * Throws {@link ValidationError} synchronously for an empty query or an
   * out-of-range limit. Otherwise the returned promise always resolves.
   */
  search(query: SearchQuery, options: SearchOptions = {}): Promise<SearchResult> {
    const normalized = normalizeQuery(query);
    const limit = this.validateLimit(options.limit);
    return this.run(normalized, limit, options.signal);
  }

  /** Resolves once every write-through started so far has settled. */
  async flush(): Promise<void> {
    while (this.pendingWrites.size > 0) {
      await Promise.all(this.pendingWrites);
    }
  }

  get pendingWriteCount(): number {
    return this.pendingWrites.size;
  }

  private async run(query: NormalizedQuery, limit: number, signal?: AbortSignal): Promise<SearchResult> {
    let live: Recipe[];
    try {
      live = query.kind === "keyword"
        ? await this.provider.searchByKeyword(query.text, limit, signal)
        : await this.provider.searchByIngredients(query.names, limit, signal);
    } catch (error) {
      if (signal?.aborted) {
        return { recipes: [], provenance: "empty", message: CANCELLED_MESSAGE };
      }
      this.log.warn({ msg: "Remote search failed, using cached recipes", query: describe(query), error: errorMessage(error) });
      return this.fallback(query, limit);
    }

    if (signal?.aborted) {
      return { recipes: [], provenance: "empty", message: CANCELLED_MESSAGE };
    }

    const recipes = live.slice(0, limit);
    this.writeThrough(recipes);
    this.log.info({ msg: "Remote search completed", query: describe(query), count: recipes.length });
    return { recipes, provenance: "live" };
  }

  private async fallback(query: NormalizedQuery, limit: number): Promise<SearchResult> {
    try {
      const recipes = query.kind === "keyword"
        ? await this.store.findByTitleSubstring(query.text, limit)
        : await this.store.findByIngredients(query.names, limit);

      if (recipes.length === 0) {
        return { recipes: [], provenance: "empty", message: NO_RESULTS_MESSAGE };
      }
      return { recipes, provenance: "cached", message: CACHED_RESULTS_MESSAGE };
    } catch (error) {
      this.log.error({ msg: "Cached search failed", query: describe(query), error: errorMessage(error) });
      return { recipes: [], provenance: "empty", message: UNAVAILABLE_MESSAGE };
    }
  }

  private writeThrough(recipes: Recipe[]): void {
    if (recipes.length === 0) {
      return;
    }

    // Deferred so a synchronous store cannot hold up the response.
    const task: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.store.upsertMany(recipes))
      .then(
        () => {
          this.log.debug({ msg: "Cached search results", count: recipes.length });
          this.onCached?.(recipes);
        },
        (error: unknown) => {
          this.log.warn({ msg: "Failed to cache search results", count: recipes.length, error: errorMessage(error) });
        }
      )
      .finally(() => {
        this.pendingWrites.delete(task);
      });

    this.pendingWrites.add(task);
  }

  private validateLimit(limit: number | undefined): number {
    if (limit === undefined) {
      return this.defaultLimit;
    }
    if (!Number.isInteger(limit) || limit < 1 || limit > this.provider.maxResults) {
      throw new ValidationError(`limit must be an integer between 1 and ${this.provider.maxResults}`);
    }
    return limit;
  }
}

function normalizeQuery(query: SearchQuery): NormalizedQuery {
  if (typeof query === "string") {
    const text = query.trim();
    if (!text) {
      throw new ValidationError("Search query must not be empty");
    }
    return { kind: "keyword", text };
  }

  const names = query.map((name) => name.trim()).filter((name) => name.length > 0);
  if (names.length === 0) {
    throw new ValidationError("At least one ingredient is required");
  }
  return { kind: "ingredients", names };
}

function describe(query: NormalizedQuery): string {
  return query.kind === "keyword" ? query.text : query.names.join(",");
}
