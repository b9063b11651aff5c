import type { Recipe } from "../types/contracts.js";
import { decodeJSON, recipeSchema } from "../types/schemas.js";
import { StoreError } from "../utils/errors.js";
import { nextSequence, type SQLiteDatabase } from "./database.js";

/**
 * Persistent store of recipes seen from the remote provider. Queries return
 * the most recently cached recipes first.
 */
export interface LocalRecipeStore {
  /** Replaces any record sharing an id. The batch is applied all-or-nothing. */
  upsertMany(recipes: readonly Recipe[]): Promise<void>;
  findByTitleSubstring(text: string, limit: number): Promise<Recipe[]>;
  /** Recipes whose ingredient text contains at least one of `names`. */
  findByIngredients(names: readonly string[], limit: number): Promise<Recipe[]>;
}

/** Store operations used by detail caching and cache statistics. */
export interface RecipeCacheStore extends LocalRecipeStore {
  get(id: string): Promise<Recipe | null>;
  count(): Promise<number>;
  countWithDetails(): Promise<number>;
  listMissingDetails(limit: number): Promise<Recipe[]>;
}

type StoredRecipeRow = {
  id: string;
  recipe_json: string;
};

const MAX_QUERY_LIMIT = 500;

export class SqliteRecipeStore implements RecipeCacheStore {
  private sequence: number;

  constructor(private readonly db: SQLiteDatabase) {
    this.sequence = nextSequence(db, "recipe_cache");
  }

  async upsertMany(recipes: readonly Recipe[]): Promise<void> {
    if (recipes.length === 0) {
      return;
    }

    // Earlier entries in a batch get the higher sequence so that a batch keeps
    // its relevance order when read back newest-first.
    const base = this.sequence;
    const now = Date.now();

    try {
      const statement = this.db.prepare(`
        INSERT INTO recipe_cache (id, title_search, ingredients_search, recipe_json, has_details, cached_at, seq)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          title_search = excluded.title_search,
          ingredients_search = excluded.ingredients_search,
          recipe_json = excluded.recipe_json,
          has_details = excluded.has_details,
          cached_at = excluded.cached_at,
          seq = excluded.seq
      `);

      this.db.transaction((batch: readonly Recipe[]) => {
        batch.forEach((recipe, index) => {
          statement.run(
            recipe.id,
            recipe.title.toLowerCase(),
            ingredientSearchText(recipe),
            JSON.stringify(recipe),
            hasFullDetails(recipe) ? 1 : 0,
            now,
            base + batch.length - index
          );
        });
      })(recipes);
    } catch (error) {
      throw new StoreError(`Failed to cache ${recipes.length} recipes`, error);
    }
    this.sequence = base + recipes.length + 1;
  }

  async findByTitleSubstring(text: string, limit: number): Promise<Recipe[]> {
    const needle = text.trim().toLowerCase();
    if (!needle) {
      return [];
    }

    return this.query(
      "SELECT id, recipe_json FROM recipe_cache WHERE instr(title_search, ?) > 0 ORDER BY seq DESC LIMIT ?",
      [needle, clampLimit(limit)]
    );
  }

  async findByIngredients(names: readonly string[], limit: number): Promise<Recipe[]> {
    const needles = names.map((name) => name.trim().toLowerCase()).filter((name) => name.length > 0);
    if (needles.length === 0) {
      return [];
    }

    const clause = needles.map(() => "instr(ingredients_search, ?) > 0").join(" OR ");
    return this.query(
      `SELECT id, recipe_json FROM recipe_cache WHERE ${clause} ORDER BY seq DESC LIMIT ?`,
      [...needles, clampLimit(limit)]
    );
  }

  async get(id: string): Promise<Recipe | null> {
    const rows = this.query("SELECT id, recipe_json FROM recipe_cache WHERE id = ?", [id]);
    return rows[0] ?? null;
  }

  async count(): Promise<number> {
    return this.scalar("SELECT COUNT(*) AS count FROM recipe_cache");
  }

  async countWithDetails(): Promise<number> {
    return this.scalar("SELECT COUNT(*) AS count FROM recipe_cache WHERE has_details = 1");
  }

  async listMissingDetails(limit: number): Promise<Recipe[]> {
    return this.query(
      "SELECT id, recipe_json FROM recipe_cache WHERE has_details = 0 ORDER BY seq DESC LIMIT ?",
      [clampLimit(limit)]
    );
  }

  private query(sql: string, params: unknown[]): Recipe[] {
    let rows: StoredRecipeRow[];
    try {
      rows = this.db.prepare(sql).all(...params) as StoredRecipeRow[];
    } catch (error) {
      throw new StoreError("Failed to read cached recipes", error);
    }

    return rows
      .map((row) => decodeJSON(row.recipe_json, recipeSchema))
      .filter((recipe): recipe is Recipe => recipe !== null);
  }

  private scalar(sql: string): number {
    try {
      const row = this.db.prepare(sql).get() as { count?: number } | undefined;
      return row?.count ?? 0;
    } catch (error) {
      throw new StoreError("Failed to count cached recipes", error);
    }
  }
}

export function hasFullDetails(recipe: Recipe): boolean {
  return recipe.ingredients.length > 0 && recipe.instructions.length > 0;
}

function ingredientSearchText(recipe: Recipe): string {
  return recipe.ingredients
    .flatMap((ingredient) => [ingredient.original, ingredient.name ?? ""])
    .filter((text) => text.length > 0)
    .join("\n")
    .toLowerCase();
}

function clampLimit(limit: number): number {
  return Math.max(1, Math.min(Math.floor(limit), MAX_QUERY_LIMIT));
}
