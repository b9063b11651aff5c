import test from "node:test";
import assert from "node:assert/strict";
import { CollectionService, DEFAULT_COLLECTION_NAME, type CollectionDraft } from "../src/services/collections.js";
import { openDatabase } from "../src/services/database.js";
import { ConflictError, NotFoundError, ValidationError } from "../src/utils/errors.js";
import { makeRecipe, steppingClock } from "./helpers.js";

function draft(name: string, overrides: Partial<CollectionDraft> = {}): CollectionDraft {
  return {
    name,
    icon: "favorite",
    color: "#FF4757",
    coverImageType: "grid",
    isPinned: false,
    ...overrides,
  };
}

function createService(): CollectionService {
  return new CollectionService(openDatabase(":memory:"), steppingClock());
}

test("the default collection is created on first access and cannot be deleted", () => {
  const service = createService();

  const [favorites, ...rest] = service.list("user-1");
  assert.ok(favorites);
  assert.equal(rest.length, 0);
  assert.equal(favorites.name, DEFAULT_COLLECTION_NAME);
  assert.equal(favorites.isDefault, true);
  assert.equal(favorites.sortOrder, 0);

  assert.equal(service.list("user-1").length, 1);
  assert.throws(() => service.delete("user-1", favorites.id), ConflictError);
});

test("list orders pinned collections first, then by sort order", () => {
  const service = createService();
  const dinners = service.create("user-1", draft("Dinners"));
  service.create("user-1", draft("Desserts"));
  service.togglePin("user-1", dinners.id);

  assert.deepEqual(service.list("user-1").map((collection) => collection.name), [
    "Dinners",
    DEFAULT_COLLECTION_NAME,
    "Desserts",
  ]);
});

test("reorder moves a collection and renumbers sort order", () => {
  const service = createService();
  service.create("user-1", draft("Breakfast"));
  service.create("user-1", draft("Lunch"));

  const reordered = service.reorder("user-1", 2, 0);

  assert.deepEqual(reordered.map((collection) => [collection.name, collection.sortOrder]), [
    ["Lunch", 0],
    [DEFAULT_COLLECTION_NAME, 1],
    ["Breakfast", 2],
  ]);
  assert.deepEqual(service.list("user-1").map((collection) => collection.name), [
    "Lunch",
    DEFAULT_COLLECTION_NAME,
    "Breakfast",
  ]);
  assert.throws(() => service.reorder("user-1", 0, 3), ValidationError);
});

test("addRecipe is idempotent and keeps recipeCount current", () => {
  const service = createService();
  const collection = service.create("user-1", draft("Soups"));
  const tomato = makeRecipe("spoonacular:1", "Tomato Soup", { imageUrl: "https://img.example.test/1.jpg" });
  const leek = makeRecipe("spoonacular:2", "Leek Soup");

  assert.equal(service.addRecipe("user-1", collection.id, tomato), true);
  assert.equal(service.addRecipe("user-1", collection.id, tomato), false);
  assert.equal(service.addRecipe("user-1", collection.id, leek), true);

  assert.equal(service.get("user-1", collection.id)?.recipeCount, 2);
  assert.deepEqual(service.listRecipes("user-1", collection.id).map((recipe) => recipe.id), [
    "spoonacular:2",
    "spoonacular:1",
  ]);
  assert.deepEqual(service.coverImages("user-1", collection.id), ["https://img.example.test/1.jpg"]);

  assert.equal(service.removeRecipe("user-1", collection.id, "spoonacular:1"), true);
  assert.equal(service.removeRecipe("user-1", collection.id, "spoonacular:1"), false);
  assert.equal(service.get("user-1", collection.id)?.recipeCount, 1);
});

test("collections of another user are not reachable", () => {
  const service = createService();
  const collection = service.create("user-1", draft("Private"));

  assert.throws(() => service.addRecipe("user-2", collection.id, makeRecipe("r1", "Toast")), NotFoundError);
  assert.equal(service.delete("user-2", collection.id), false);
});

test("duplicate copies recipes in order without pin or share", () => {
  const service = createService();
  const source = service.create("user-1", draft("Weeknight", { isPinned: true }));
  service.addRecipe("user-1", source.id, makeRecipe("r1", "Tacos"));
  service.addRecipe("user-1", source.id, makeRecipe("r2", "Stir Fry"));
  service.share("user-1", source.id);

  const copy = service.duplicate("user-1", source.id, "Weeknight Copy");

  assert.equal(copy.name, "Weeknight Copy");
  assert.equal(copy.isPinned, false);
  assert.equal(copy.isDefault, false);
  assert.equal(copy.isPublic, false);
  assert.equal(copy.shareToken, undefined);
  assert.equal(copy.recipeCount, 2);
  assert.deepEqual(service.listRecipes("user-1", copy.id).map((recipe) => recipe.id), ["r2", "r1"]);
});

test("collectionsForRecipe lists the user's collections holding a recipe", () => {
  const service = createService();
  const a = service.create("user-1", draft("A"));
  const b = service.create("user-1", draft("B"));
  service.create("user-1", draft("C"));
  service.addRecipe("user-1", a.id, makeRecipe("r1", "Pie"));
  service.addRecipe("user-1", b.id, makeRecipe("r1", "Pie"));

  assert.deepEqual(service.collectionsForRecipe("user-1", "r1").map((collection) => collection.name), ["A", "B"]);
  assert.deepEqual(service.collectionsForRecipe("user-2", "r1"), []);
});

test("share exposes a collection by token until revoked", () => {
  const service = createService();
  const collection = service.create("user-1", draft("Party Food"));
  service.addRecipe("user-1", collection.id, makeRecipe("r1", "Nachos"));

  const shared = service.share("user-1", collection.id);
  const token = shared.shareToken;
  assert.ok(token);
  assert.equal(shared.isPublic, true);
  assert.equal(service.share("user-1", collection.id).shareToken, token);

  const view = service.getShared(token);
  assert.equal(view?.collection.name, "Party Food");
  assert.deepEqual(view?.recipes.map((recipe) => recipe.title), ["Nachos"]);

  const revoked = service.revokeShare("user-1", collection.id);
  assert.equal(revoked.isPublic, false);
  assert.equal(service.getShared(token), null);
});

test("update changes the given fields only", () => {
  const service = createService();
  const collection = service.create("user-1", draft("Drinks", { description: "Cold ones" }));

  const updated = service.update("user-1", collection.id, { color: "#00AA55" });
  assert.equal(updated.color, "#00AA55");
  assert.equal(updated.description, "Cold ones");
  assert.equal(updated.name, "Drinks");
  assert.throws(() => service.update("user-1", "missing", { name: "X" }), NotFoundError);
});
