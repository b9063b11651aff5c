import { randomUUID } from "node:crypto";
import type { GroceryCategory, GroceryItem } from "../types/contracts.js";
import { decodeJSON, groceryItemSchema } from "../types/schemas.js";
import { NotFoundError, StoreError } from "../utils/errors.js";
import { nextSequence, type SQLiteDatabase } from "./database.js";

export type GroceryItemDraft = {
  name: string;
  category?: GroceryCategory;
  quantity?: number;
  unit?: string;
  isPinned: boolean;
};

type GroceryRow = {
  item_json: string;
};

export class GroceryService {
  constructor(
    private readonly db: SQLiteDatabase,
    private readonly now: () => Date = () => new Date()
  ) {}

  add(userId: string, draft: GroceryItemDraft): GroceryItem {
    const item: GroceryItem = {
      ...draft,
      name: draft.name.trim(),
      id: randomUUID(),
      addedAt: this.now().toISOString(),
    };

    this.write(
      "INSERT INTO grocery_items (id, user_id, item_json, is_pinned, added_at, seq) VALUES (?, ?, ?, ?, ?, ?)",
      [item.id, userId, JSON.stringify(item), item.isPinned ? 1 : 0, item.addedAt, nextSequence(this.db, "grocery_items")]
    );
    return item;
  }

  update(userId: string, id: string, changes: Partial<GroceryItemDraft>): GroceryItem {
    const existing = this.get(userId, id);
    if (!existing) {
      throw new NotFoundError(`Grocery item ${id} not found`);
    }

    const item: GroceryItem = { ...existing, ...changes, id, addedAt: existing.addedAt };
    this.save(userId, item);
    return item;
  }

  setPinned(userId: string, id: string, isPinned: boolean): GroceryItem {
    return this.update(userId, id, { isPinned });
  }

  remove(userId: string, id: string): boolean {
    return this.write("DELETE FROM grocery_items WHERE id = ? AND user_id = ?", [id, userId]) > 0;
  }

  /** Returns the number of items removed. */
  clear(userId: string): number {
    return this.write("DELETE FROM grocery_items WHERE user_id = ?", [userId]);
  }

  get(userId: string, id: string): GroceryItem | null {
    return this.read("SELECT item_json FROM grocery_items WHERE id = ? AND user_id = ?", [id, userId])[0] ?? null;
  }

  /** Pinned items first, then newest first. */
  list(userId: string): GroceryItem[] {
    return this.read(
      "SELECT item_json FROM grocery_items WHERE user_id = ? ORDER BY is_pinned DESC, seq DESC",
      [userId]
    );
  }

  groupByCategory(userId: string): Partial<Record<GroceryCategory, GroceryItem[]>> {
    const groups: Partial<Record<GroceryCategory, GroceryItem[]>> = {};
    for (const item of this.list(userId)) {
      (groups[item.category ?? "other"] ??= []).push(item);
    }
    return groups;
  }

  count(userId: string): number {
    return this.list(userId).length;
  }

  /** Distinct item names, in list order, for ingredient searches. */
  ingredientNames(userId: string): string[] {
    const seen = new Set<string>();
    const names: string[] = [];
    for (const item of this.list(userId)) {
      const key = item.name.toLowerCase();
      if (!seen.has(key)) {
        seen.add(key);
        names.push(item.name);
      }
    }
    return names;
  }

  private save(userId: string, item: GroceryItem): void {
    this.write(
      "UPDATE grocery_items SET item_json = ?, is_pinned = ? WHERE id = ? AND user_id = ?",
      [JSON.stringify(item), item.isPinned ? 1 : 0, item.id, userId]
    );
  }

  private read(sql: string, params: unknown[]): GroceryItem[] {
    let rows: GroceryRow[];
    try {
      rows = this.db.prepare(sql).all(...params) as GroceryRow[];
    } catch (error) {
      throw new StoreError("Failed to read grocery items", error);
    }

    return rows
      .map((row) => decodeJSON(row.item_json, groceryItemSchema))
      .filter((item): item is GroceryItem => item !== null);
  }

  private write(sql: string, params: unknown[]): number {
    try {
      return this.db.prepare(sql).run(...params).changes;
    } catch (error) {
      throw new StoreError("Failed to save grocery item", error);
    }
  }
}
