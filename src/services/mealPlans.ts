import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { MealPlan } from "../types/contracts.js";
import { decodeJSON } from "../types/schemas.js";
import { StoreError } from "../utils/errors.js";
import { nextSequence, type SQLiteDatabase } from "./database.js";

export type MealPlanDraft = {
  name: string;
  recipeIds: readonly string[];
  ingredients: readonly string[];
};

const stringListSchema = z.array(z.string());

type MealPlanRow = {
  id: string;
  user_id: string;
  name: string;
  recipe_ids_json: string;
  ingredients_json: string;
  created_at: string;
};

/** Saved meal plans: recipes picked from an ingredient search. */
export class MealPlanService {
  constructor(
    private readonly db: SQLiteDatabase,
    private readonly now: () => Date = () => new Date()
  ) {}

  save(userId: string, draft: MealPlanDraft): MealPlan {
    const plan: MealPlan = {
      id: randomUUID(),
      userId,
      name: draft.name.trim(),
      recipeIds: cleanList(draft.recipeIds),
      ingredients: cleanList(draft.ingredients),
      createdAt: this.now().toISOString(),
    };

    this.run(
      `INSERT INTO meal_plans (id, user_id, name, recipe_ids_json, ingredients_json, created_at, seq)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        plan.id,
        userId,
        plan.name,
        JSON.stringify(plan.recipeIds),
        JSON.stringify(plan.ingredients),
        plan.createdAt,
        nextSequence(this.db, "meal_plans"),
      ]
    );
    return plan;
  }

  /** Newest first. */
  list(userId: string): MealPlan[] {
    return this.read(
      `SELECT id, user_id, name, recipe_ids_json, ingredients_json, created_at
       FROM meal_plans WHERE user_id = ? ORDER BY seq DESC`,
      [userId]
    );
  }

  get(userId: string, id: string): MealPlan | null {
    return this.read(
      `SELECT id, user_id, name, recipe_ids_json, ingredients_json, created_at
       FROM meal_plans WHERE id = ? AND user_id = ?`,
      [id, userId]
    )[0] ?? null;
  }

  delete(userId: string, id: string): boolean {
    return this.run("DELETE FROM meal_plans WHERE id = ? AND user_id = ?", [id, userId]) > 0;
  }

  private read(sql: string, params: unknown[]): MealPlan[] {
    let rows: MealPlanRow[];
    try {
      rows = this.db.prepare(sql).all(...params) as MealPlanRow[];
    } catch (error) {
      throw new StoreError("Failed to read meal plans", error);
    }

    return rows.map((row) => ({
      id: row.id,
      userId: row.user_id,
      name: row.name,
      recipeIds: decodeJSON(row.recipe_ids_json, stringListSchema) ?? [],
      ingredients: decodeJSON(row.ingredients_json, stringListSchema) ?? [],
      createdAt: row.created_at,
    }));
  }

  private run(sql: string, params: unknown[]): number {
    try {
      return this.db.prepare(sql).run(...params).changes;
    } catch (error) {
      throw new StoreError("Failed to save meal plan", error);
    }
  }
}

// Trimmed, blanks dropped, first occurrence kept.
function cleanList(values: readonly string[]): string[] {
  return Array.from(new Set(values.map((value) => value.trim()).filter((value) => value.length > 0)));
}
