import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export type SQLiteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS recipe_cache (
    id TEXT PRIMARY KEY,
    title_search TEXT NOT NULL,
    ingredients_search TEXT NOT NULL,
    recipe_json TEXT NOT NULL,
    has_details INTEGER NOT NULL,
    cached_at INTEGER NOT NULL,
    seq INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_recipe_cache_seq ON recipe_cache(seq DESC);
  CREATE INDEX IF NOT EXISTS idx_recipe_cache_details ON recipe_cache(has_details);

  CREATE TABLE IF NOT EXISTS custom_recipes (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    category TEXT,
    recipe_json TEXT NOT NULL,
    created_at TEXT NOT NULL,
    seq INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_custom_recipes_user ON custom_recipes(user_id, seq DESC);

  CREATE TABLE IF NOT EXISTS grocery_items (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    item_json TEXT NOT NULL,
    is_pinned INTEGER NOT NULL,
    added_at TEXT NOT NULL,
    seq INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_grocery_items_user ON grocery_items(user_id, is_pinned DESC, seq DESC);

  CREATE TABLE IF NOT EXISTS collections (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    collection_json TEXT NOT NULL,
    share_token TEXT UNIQUE
  );
  CREATE INDEX IF NOT EXISTS idx_collections_user ON collections(user_id);

  CREATE TABLE IF NOT EXISTS collection_recipes (
    collection_id TEXT NOT NULL REFERENCES collections(id) ON DELETE CASCADE,
    recipe_id TEXT NOT NULL,
    recipe_json TEXT NOT NULL,
    added_at INTEGER NOT NULL,
    seq INTEGER NOT NULL,
    PRIMARY KEY (collection_id, recipe_id)
  );

  CREATE TABLE IF NOT EXISTS ingredient_searches (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    ingredients_json TEXT NOT NULL,
    recipe_count INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    seq INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_ingredient_searches_user ON ingredient_searches(user_id, seq DESC);

  CREATE TABLE IF NOT EXISTS meal_plans (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    name TEXT NOT NULL,
    recipe_ids_json TEXT NOT NULL,
    ingredients_json TEXT NOT NULL,
    created_at TEXT NOT NULL,
    seq INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_meal_plans_user ON meal_plans(user_id, seq DESC);

  CREATE TABLE IF NOT EXISTS user_preferences (
    user_id TEXT PRIMARY KEY,
    preferences_json TEXT NOT NULL
  );
`;

/**
 * Opens the application database and applies the schema. Pass ":memory:" for
 * a throwaway database.
 */
export function openDatabase(dbPath: string): SQLiteDatabase {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA);
  return db;
}

export function nextSequence(db: SQLiteDatabase, table: string): number {
  const row = db.prepare(`SELECT COALESCE(MAX(seq), 0) AS seq FROM ${table}`).get() as { seq: number };
  return row.seq + 1;
}
