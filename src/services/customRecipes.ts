import { randomUUID } from "node:crypto";
import type { CustomRecipe, CustomRecipeDraft, Recipe } from "../types/contracts.js";
import { customRecipeSchema, decodeJSON } from "../types/schemas.js";
import { ConflictError, NotFoundError, StoreError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { nextSequence, type SQLiteDatabase } from "./database.js";

export const UNCATEGORIZED = "other";

const log = createChildLogger({ service: "custom-recipes" });

type CustomRecipeRow = {
  id: string;
  recipe_json: string;
};

type Clock = () => Date;

/** Recipes a user wrote or imported. Lists are newest first. */
export class CustomRecipeService {
  constructor(
    private readonly db: SQLiteDatabase,
    private readonly now: Clock = () => new Date()
  ) {}

  create(userId: string, draft: CustomRecipeDraft): CustomRecipe {
    const id = draft.id ?? randomUUID();
    if (this.exists(id)) {
      throw new ConflictError(`Recipe ${id} already exists`);
    }

    const recipe = withTotalTime({
      ...draft,
      id,
      userId,
      createdAt: this.now().toISOString(),
    });

    this.write(
      "INSERT INTO custom_recipes (id, user_id, category, recipe_json, created_at, seq) VALUES (?, ?, ?, ?, ?, ?)",
      [id, userId, recipe.category ?? null, JSON.stringify(recipe), recipe.createdAt, nextSequence(this.db, "custom_recipes")]
    );
    return recipe;
  }

  update(userId: string, id: string, draft: CustomRecipeDraft): CustomRecipe {
    const existing = this.get(userId, id);
    if (!existing) {
      throw new NotFoundError(`Recipe ${id} not found`);
    }

    const recipe = withTotalTime({
      ...draft,
      id,
      userId,
      createdAt: existing.createdAt,
      updatedAt: this.now().toISOString(),
    });

    this.write(
      "UPDATE custom_recipes SET category = ?, recipe_json = ? WHERE id = ? AND user_id = ?",
      [recipe.category ?? null, JSON.stringify(recipe), id, userId]
    );
    return recipe;
  }

  delete(userId: string, id: string): boolean {
    return this.write("DELETE FROM custom_recipes WHERE id = ? AND user_id = ?", [id, userId]) > 0;
  }

  get(userId: string, id: string): CustomRecipe | null {
    return this.read("SELECT id, recipe_json FROM custom_recipes WHERE id = ? AND user_id = ?", [id, userId])[0] ?? null;
  }

  list(userId: string): CustomRecipe[] {
    return this.read("SELECT id, recipe_json FROM custom_recipes WHERE user_id = ? ORDER BY seq DESC", [userId]);
  }

  listByCategory(userId: string, category: string): CustomRecipe[] {
    return this.read(
      "SELECT id, recipe_json FROM custom_recipes WHERE user_id = ? AND category = ? ORDER BY seq DESC",
      [userId, category]
    );
  }

  listByTag(userId: string, tag: string): CustomRecipe[] {
    const needle = tag.trim().toLowerCase();
    return this.list(userId).filter((recipe) => recipe.tags.some((item) => item.toLowerCase() === needle));
  }

  /** Case-insensitive match on title or description. */
  search(userId: string, query: string): CustomRecipe[] {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return this.list(userId);
    }

    return this.list(userId).filter(
      (recipe) =>
        recipe.title.toLowerCase().includes(needle) ||
        (recipe.description?.toLowerCase().includes(needle) ?? false)
    );
  }

  count(userId: string): number {
    try {
      const row = this.db.prepare("SELECT COUNT(*) AS count FROM custom_recipes WHERE user_id = ?").get(userId) as
        | { count?: number }
        | undefined;
      return row?.count ?? 0;
    } catch (error) {
      throw new StoreError("Failed to count custom recipes", error);
    }
  }

  groupByCategory(userId: string): Record<string, CustomRecipe[]> {
    const groups: Record<string, CustomRecipe[]> = {};
    for (const recipe of this.list(userId)) {
      const key = recipe.category ?? UNCATEGORIZED;
      (groups[key] ??= []).push(recipe);
    }
    return groups;
  }

  // Ids are unique across users.
  private exists(id: string): boolean {
    try {
      return this.db.prepare("SELECT 1 FROM custom_recipes WHERE id = ?").get(id) !== undefined;
    } catch (error) {
      throw new StoreError("Failed to read custom recipes", error);
    }
  }

  private read(sql: string, params: unknown[]): CustomRecipe[] {
    let rows: CustomRecipeRow[];
    try {
      rows = this.db.prepare(sql).all(...params) as CustomRecipeRow[];
    } catch (error) {
      throw new StoreError("Failed to read custom recipes", error);
    }

    const recipes: CustomRecipe[] = [];
    for (const row of rows) {
      const recipe = decodeJSON(row.recipe_json, customRecipeSchema);
      if (recipe) {
        recipes.push(withTotalTime(recipe));
      } else {
        log.warn({ msg: "Skipping unreadable custom recipe", id: row.id });
      }
    }
    return recipes;
  }

  private write(sql: string, params: unknown[]): number {
    try {
      return this.db.prepare(sql).run(...params).changes;
    } catch (error) {
      throw new StoreError("Failed to save custom recipe", error);
    }
  }
}

/** Prep plus cook time; absent when neither is known. */
export function totalTime(recipe: Pick<CustomRecipe, "prepTime" | "cookTime">): number | undefined {
  if (recipe.prepTime === undefined && recipe.cookTime === undefined) {
    return undefined;
  }
  return (recipe.prepTime ?? 0) + (recipe.cookTime ?? 0);
}

function withTotalTime(recipe: CustomRecipe): CustomRecipe {
  const { totalTime: _previous, ...rest } = recipe;
  const minutes = totalTime(rest);
  return minutes === undefined ? rest : { ...rest, totalTime: minutes };
}

/** The shape shared with provider recipes, for saving into collections. */
export function toRecipe(recipe: CustomRecipe): Recipe {
  return {
    id: recipe.id,
    title: recipe.title,
    imageUrl: recipe.imageUrl,
    readyInMinutes: totalTime(recipe) || undefined,
    servings: recipe.servings,
    summary: recipe.description,
    sourceUrl: recipe.sourceUrl,
    ingredients: recipe.ingredients,
    instructions: recipe.instructions,
    vegetarian: recipe.vegetarian,
    vegan: recipe.vegan,
    glutenFree: recipe.glutenFree,
    dairyFree: recipe.dairyFree,
  };
}
