import { randomBytes, randomUUID } from "node:crypto";
import type { CoverImageType, Recipe, RecipeCollection } from "../types/contracts.js";
import { collectionSchema, decodeJSON, recipeSchema } from "../types/schemas.js";
import { ConflictError, NotFoundError, StoreError, ValidationError } from "../utils/errors.js";
import { nextSequence, type SQLiteDatabase } from "./database.js";

export const DEFAULT_COLLECTION_NAME = "All Favorites";
const DEFAULT_ICON = "favorite";
const DEFAULT_COLOR = "#FF4757";
const COVER_IMAGE_COUNT = 4;

export type CollectionDraft = {
  name: string;
  description?: string;
  icon: string;
  color: string;
  coverImageType: CoverImageType;
  customCoverUrl?: string;
  isPinned: boolean;
};

export type SharedCollection = {
  collection: RecipeCollection;
  recipes: Recipe[];
};

type CollectionRow = { collection_json: string };
type CollectionRecipeRow = { recipe_json: string };

/**
 * Named groups of saved recipes. Every user has exactly one default
 * collection, created on first access, which cannot be deleted.
 */
export class CollectionService {
  constructor(
    private readonly db: SQLiteDatabase,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Pinned collections first, then by sort order. */
  list(userId: string): RecipeCollection[] {
    this.ensureDefault(userId);
    return this.readAll(userId).sort(
      (a, b) => Number(b.isPinned) - Number(a.isPinned) || a.sortOrder - b.sortOrder
    );
  }

  get(userId: string, id: string): RecipeCollection | null {
    const rows = this.query<CollectionRow>(
      "SELECT collection_json FROM collections WHERE id = ? AND user_id = ?",
      [id, userId]
    );
    return decodeCollection(rows[0]);
  }

  create(userId: string, draft: CollectionDraft): RecipeCollection {
    const existing = this.list(userId);
    const timestamp = this.now().toISOString();
    const collection: RecipeCollection = {
      ...draft,
      id: randomUUID(),
      isDefault: false,
      sortOrder: nextSortOrder(existing),
      recipeCount: 0,
      createdAt: timestamp,
      updatedAt: timestamp,
      isPublic: false,
    };

    this.insert(userId, collection);
    return collection;
  }

  update(userId: string, id: string, changes: Partial<CollectionDraft>): RecipeCollection {
    const existing = this.require(userId, id);
    const collection: RecipeCollection = {
      ...existing,
      ...changes,
      updatedAt: this.now().toISOString(),
    };
    this.save(collection);
    return collection;
  }

  delete(userId: string, id: string): boolean {
    const existing = this.get(userId, id);
    if (!existing) {
      return false;
    }
    if (existing.isDefault) {
      throw new ConflictError("The default collection cannot be deleted");
    }

    return this.run("DELETE FROM collections WHERE id = ? AND user_id = ?", [id, userId]) > 0;
  }

  togglePin(userId: string, id: string): RecipeCollection {
    const existing = this.require(userId, id);
    return this.update(userId, id, { isPinned: !existing.isPinned });
  }

  /** Moves the collection at `oldIndex` of {@link list} to `newIndex` and renumbers all of them. */
  reorder(userId: string, oldIndex: number, newIndex: number): RecipeCollection[] {
    const ordered = this.list(userId);
    if (!isIndex(oldIndex, ordered.length) || !isIndex(newIndex, ordered.length)) {
      throw new ValidationError(`Indices must be between 0 and ${ordered.length - 1}`);
    }

    const [moved] = ordered.splice(oldIndex, 1);
    if (!moved) {
      return ordered;
    }
    ordered.splice(newIndex, 0, moved);

    const timestamp = this.now().toISOString();
    const renumbered = ordered.map((collection, index) => ({ ...collection, sortOrder: index, updatedAt: timestamp }));
    this.db.transaction(() => {
      for (const collection of renumbered) {
        this.save(collection);
      }
    })();
    return renumbered;
  }

  /** Copies the collection and its recipes under a new name. The copy is never pinned or shared. */
  duplicate(userId: string, id: string, newName: string): RecipeCollection {
    const source = this.require(userId, id);
    const name = newName.trim();
    if (!name) {
      throw new ValidationError("Collection name must not be empty");
    }

    const copy = this.create(userId, {
      name,
      description: source.description,
      icon: source.icon,
      color: source.color,
      coverImageType: source.coverImageType,
      customCoverUrl: source.customCoverUrl,
      isPinned: false,
    });

    // Oldest first so the copy keeps the newest-first order.
    const recipes = this.listRecipes(userId, id).reverse();
    for (const recipe of recipes) {
      this.insertRecipe(copy.id, recipe);
    }
    return this.refreshCount(copy);
  }

  /** Returns false when the recipe was already in the collection. */
  addRecipe(userId: string, collectionId: string, recipe: Recipe): boolean {
    const collection = this.require(userId, collectionId);
    const added = this.insertRecipe(collection.id, recipe);
    if (added) {
      this.refreshCount(collection);
    }
    return added;
  }

  removeRecipe(userId: string, collectionId: string, recipeId: string): boolean {
    const collection = this.require(userId, collectionId);
    const removed = this.run(
      "DELETE FROM collection_recipes WHERE collection_id = ? AND recipe_id = ?",
      [collection.id, recipeId]
    ) > 0;
    if (removed) {
      this.refreshCount(collection);
    }
    return removed;
  }

  /** Newest additions first. */
  listRecipes(userId: string, collectionId: string): Recipe[] {
    const collection = this.require(userId, collectionId);
    return this.recipesOf(collection.id);
  }

  coverImages(userId: string, collectionId: string): string[] {
    return this.listRecipes(userId, collectionId)
      .map((recipe) => recipe.imageUrl)
      .filter((url): url is string => url !== undefined)
      .slice(0, COVER_IMAGE_COUNT);
  }

  collectionsForRecipe(userId: string, recipeId: string): RecipeCollection[] {
    const ids = new Set(
      this.query<{ collection_id: string }>(
        "SELECT collection_id FROM collection_recipes WHERE recipe_id = ?",
        [recipeId]
      ).map((row) => row.collection_id)
    );
    return this.list(userId).filter((collection) => ids.has(collection.id));
  }

  /** Makes the collection public. An existing share token is reused. */
  share(userId: string, id: string): RecipeCollection {
    const existing = this.require(userId, id);
    const collection: RecipeCollection = {
      ...existing,
      shareToken: existing.shareToken ?? randomBytes(18).toString("base64url"),
      isPublic: true,
      updatedAt: this.now().toISOString(),
    };
    this.save(collection);
    return collection;
  }

  revokeShare(userId: string, id: string): RecipeCollection {
    const existing = this.require(userId, id);
    const collection: RecipeCollection = {
      ...existing,
      shareToken: undefined,
      isPublic: false,
      updatedAt: this.now().toISOString(),
    };
    this.save(collection);
    return collection;
  }

  getShared(token: string): SharedCollection | null {
    const rows = this.query<CollectionRow>("SELECT collection_json FROM collections WHERE share_token = ?", [token]);
    const collection = decodeCollection(rows[0]);
    if (!collection?.isPublic) {
      return null;
    }
    return { collection, recipes: this.recipesOf(collection.id) };
  }

  private ensureDefault(userId: string): void {
    if (this.readAll(userId).some((collection) => collection.isDefault)) {
      return;
    }

    const timestamp = this.now().toISOString();
    this.insert(userId, {
      id: randomUUID(),
      name: DEFAULT_COLLECTION_NAME,
      icon: DEFAULT_ICON,
      color: DEFAULT_COLOR,
      coverImageType: "grid",
      isPinned: false,
      isDefault: true,
      sortOrder: 0,
      recipeCount: 0,
      createdAt: timestamp,
      updatedAt: timestamp,
      isPublic: false,
    });
  }

  private require(userId: string, id: string): RecipeCollection {
    const collection = this.get(userId, id);
    if (!collection) {
      throw new NotFoundError(`Collection ${id} not found`);
    }
    return collection;
  }

  private readAll(userId: string): RecipeCollection[] {
    return this.query<CollectionRow>("SELECT collection_json FROM collections WHERE user_id = ?", [userId])
      .map((row) => decodeCollection(row))
      .filter((collection): collection is RecipeCollection => collection !== null);
  }

  private recipesOf(collectionId: string): Recipe[] {
    return this.query<CollectionRecipeRow>(
      "SELECT recipe_json FROM collection_recipes WHERE collection_id = ? ORDER BY seq DESC",
      [collectionId]
    )
      .map((row) => decodeJSON(row.recipe_json, recipeSchema))
      .filter((recipe): recipe is Recipe => recipe !== null);
  }

  private insertRecipe(collectionId: string, recipe: Recipe): boolean {
    return this.run(
      `INSERT INTO collection_recipes (collection_id, recipe_id, recipe_json, added_at, seq)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(collection_id, recipe_id) DO NOTHING`,
      [collectionId, recipe.id, JSON.stringify(recipe), this.now().getTime(), nextSequence(this.db, "collection_recipes")]
    ) > 0;
  }

  private refreshCount(collection: RecipeCollection): RecipeCollection {
    const row = this.query<{ count: number }>(
      "SELECT COUNT(*) AS count FROM collection_recipes WHERE collection_id = ?",
      [collection.id]
    )[0];
    const updated: RecipeCollection = {
      ...collection,
      recipeCount: row?.count ?? 0,
      updatedAt: this.now().toISOString(),
    };
    this.save(updated);
    return updated;
  }

  private insert(userId: string, collection: RecipeCollection): void {
    this.run(
      "INSERT INTO collections (id, user_id, collection_json, share_token) VALUES (?, ?, ?, ?)",
      [collection.id, userId, JSON.stringify(collection), collection.shareToken ?? null]
    );
  }

  private save(collection: RecipeCollection): void {
    this.run(
      "UPDATE collections SET collection_json = ?, share_token = ? WHERE id = ?",
      [JSON.stringify(collection), collection.shareToken ?? null, collection.id]
    );
  }

  private query<Row>(sql: string, params: unknown[]): Row[] {
    try {
      return this.db.prepare(sql).all(...params) as Row[];
    } catch (error) {
      throw new StoreError("Failed to read collections", error);
    }
  }

  private run(sql: string, params: unknown[]): number {
    try {
      return this.db.prepare(sql).run(...params).changes;
    } catch (error) {
      throw new StoreError("Failed to save collection", error);
    }
  }
}

function decodeCollection(row: CollectionRow | undefined): RecipeCollection | null {
  return row ? decodeJSON(row.collection_json, collectionSchema) : null;
}

function nextSortOrder(collections: readonly RecipeCollection[]): number {
  return collections.reduce((max, collection) => Math.max(max, collection.sortOrder), -1) + 1;
}

function isIndex(value: number, length: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < length;
}
