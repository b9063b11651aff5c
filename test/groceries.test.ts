import test from "node:test";
import assert from "node:assert/strict";
import { openDatabase } from "../src/services/database.js";
import { GroceryService } from "../src/services/groceries.js";
import { NotFoundError } from "../src/utils/errors.js";
import { steppingClock } from "./helpers.js";

function createService(): GroceryService {
  return new GroceryService(openDatabase(":memory:"), steppingClock());
}

test("add stores a trimmed item with a timestamp", () => {
  const service = createService();
  const item = service.add("user-1", { name: "  Milk ", category: "dairy", quantity: 2, unit: "L", isPinned: false });

  assert.equal(item.name, "Milk");
  assert.equal(item.addedAt, "2024-03-01T10:00:00.000Z");
  assert.deepEqual(service.get("user-1", item.id), item);
});

test("list puts pinned items first, then newest", () => {
  const service = createService();
  service.add("user-1", { name: "Eggs", isPinned: false });
  service.add("user-1", { name: "Bread", isPinned: true });
  service.add("user-1", { name: "Apples", isPinned: false });

  assert.deepEqual(service.list("user-1").map((item) => item.name), ["Bread", "Apples", "Eggs"]);
  assert.equal(service.count("user-1"), 3);
});

test("setPinned and update change an item in place", () => {
  const service = createService();
  const eggs = service.add("user-1", { name: "Eggs", isPinned: false });
  service.add("user-1", { name: "Flour", isPinned: false });

  service.setPinned("user-1", eggs.id, true);
  assert.deepEqual(service.list("user-1").map((item) => item.name), ["Eggs", "Flour"]);

  const updated = service.update("user-1", eggs.id, { quantity: 12 });
  assert.equal(updated.quantity, 12);
  assert.equal(updated.isPinned, true);
  assert.equal(updated.addedAt, eggs.addedAt);

  assert.throws(() => service.update("user-2", eggs.id, { quantity: 1 }), NotFoundError);
});

test("remove and clear are scoped to the user", () => {
  const service = createService();
  const milk = service.add("user-1", { name: "Milk", isPinned: false });
  service.add("user-1", { name: "Tea", isPinned: false });
  service.add("user-2", { name: "Coffee", isPinned: false });

  assert.equal(service.remove("user-2", milk.id), false);
  assert.equal(service.remove("user-1", milk.id), true);
  assert.equal(service.clear("user-1"), 1);
  assert.equal(service.count("user-1"), 0);
  assert.equal(service.count("user-2"), 1);
});

test("groupByCategory files uncategorised items under other", () => {
  const service = createService();
  service.add("user-1", { name: "Carrots", category: "vegetables", isPinned: false });
  service.add("user-1", { name: "Foil", isPinned: false });
  service.add("user-1", { name: "Spinach", category: "vegetables", isPinned: false });

  const groups = service.groupByCategory("user-1");
  assert.deepEqual(groups.vegetables?.map((item) => item.name), ["Spinach", "Carrots"]);
  assert.deepEqual(groups.other?.map((item) => item.name), ["Foil"]);
});

test("ingredientNames drops case-insensitive duplicates", () => {
  const service = createService();
  service.add("user-1", { name: "tomato", isPinned: false });
  service.add("user-1", { name: "Basil", isPinned: false });
  service.add("user-1", { name: "Tomato", isPinned: false });

  assert.deepEqual(service.ingredientNames("user-1"), ["Tomato", "Basil"]);
});
