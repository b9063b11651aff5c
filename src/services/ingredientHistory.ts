import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { IngredientSearch, IngredientUsage } from "../types/contracts.js";
import { decodeJSON } from "../types/schemas.js";
import { StoreError } from "../utils/errors.js";
import { nextSequence, type SQLiteDatabase } from "./database.js";

const DEFAULT_LIST_LIMIT = 20;
const DEFAULT_TOP_LIMIT = 10;
const TOP_INGREDIENT_WINDOW = 100;

const ingredientListSchema = z.array(z.string());

type IngredientSearchRow = {
  id: string;
  user_id: string;
  ingredients_json: string;
  recipe_count: number;
  created_at: string;
};

export class IngredientHistoryService {
  constructor(
    private readonly db: SQLiteDatabase,
    private readonly now: () => Date = () => new Date()
  ) {}

  record(userId: string, ingredients: readonly string[], recipeCount: number): IngredientSearch {
    const entry: IngredientSearch = {
      id: randomUUID(),
      userId,
      ingredients: ingredients.map((name) => name.trim()).filter((name) => name.length > 0),
      recipeCount: Math.max(0, Math.floor(recipeCount)),
      createdAt: this.now().toISOString(),
    };

    this.run(
      "INSERT INTO ingredient_searches (id, user_id, ingredients_json, recipe_count, created_at, seq) VALUES (?, ?, ?, ?, ?, ?)",
      [
        entry.id,
        userId,
        JSON.stringify(entry.ingredients),
        entry.recipeCount,
        entry.createdAt,
        nextSequence(this.db, "ingredient_searches"),
      ]
    );
    return entry;
  }

  /** Newest first. */
  list(userId: string, limit: number = DEFAULT_LIST_LIMIT): IngredientSearch[] {
    let rows: IngredientSearchRow[];
    try {
      rows = this.db
        .prepare(
          `SELECT id, user_id, ingredients_json, recipe_count, created_at
           FROM ingredient_searches WHERE user_id = ? ORDER BY seq DESC LIMIT ?`
        )
        .all(userId, Math.max(1, Math.floor(limit))) as IngredientSearchRow[];
    } catch (error) {
      throw new StoreError("Failed to read ingredient searches", error);
    }

    return rows.map((row) => ({
      id: row.id,
      userId: row.user_id,
      ingredients: decodeJSON(row.ingredients_json, ingredientListSchema) ?? [],
      recipeCount: row.recipe_count,
      createdAt: row.created_at,
    }));
  }

  delete(userId: string, id: string): boolean {
    return this.run("DELETE FROM ingredient_searches WHERE id = ? AND user_id = ?", [id, userId]) > 0;
  }

  clear(userId: string): number {
    return this.run("DELETE FROM ingredient_searches WHERE user_id = ?", [userId]);
  }

  count(userId: string): number {
    try {
      const row = this.db.prepare("SELECT COUNT(*) AS count FROM ingredient_searches WHERE user_id = ?").get(userId) as
        | { count?: number }
        | undefined;
      return row?.count ?? 0;
    } catch (error) {
      throw new StoreError("Failed to count ingredient searches", error);
    }
  }

  /**
   * Most frequent ingredients over the latest searches, lower-cased. Equal
   * counts keep the order in which they were first seen, newest search first.
   */
  mostUsedIngredients(userId: string, limit: number = DEFAULT_TOP_LIMIT): IngredientUsage[] {
    const counts = new Map<string, number>();
    for (const search of this.list(userId, TOP_INGREDIENT_WINDOW)) {
      for (const ingredient of search.ingredients) {
        const key = ingredient.trim().toLowerCase();
        if (key) {
          counts.set(key, (counts.get(key) ?? 0) + 1);
        }
      }
    }

    return [...counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, Math.max(0, limit))
      .map(([name, count]) => ({ name, count }));
  }

  private run(sql: string, params: unknown[]): number {
    try {
      return this.db.prepare(sql).run(...params).changes;
    } catch (error) {
      throw new StoreError("Failed to save ingredient search", error);
    }
  }
}
