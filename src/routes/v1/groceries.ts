import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../../middleware/error.js";
import type { AppServices } from "../../services/container.js";
import { groceryItemInputSchema } from "../../types/schemas.js";
import { NotFoundError } from "../../utils/errors.js";
import { abortOnClose, optionalLimit, pathParam } from "./params.js";

const pinBody = z.object({ isPinned: z.boolean() });
const recipesQuery = z.object({ limit: optionalLimit });

/** Mounted under /users/:userId/groceries. */
export function createGroceriesRouter(services: AppServices): Router {
  const router = Router({ mergeParams: true });
  const groceries = services.groceries;

  router.get("/", (req, res) => {
    const userId = pathParam(req, "userId");
    const items = groceries.list(userId);
    res.json({ items, total: items.length });
  });

  router.get("/grouped", (req, res) => {
    res.json({ groups: groceries.groupByCategory(pathParam(req, "userId")) });
  });

  // Recipes that use what is on the list.
  router.get("/recipes", asyncHandler(async (req, res) => {
    const { limit } = recipesQuery.parse(req.query);
    const names = groceries.ingredientNames(pathParam(req, "userId"));
    res.json(await services.search.search(names, { limit, signal: abortOnClose(res) }));
  }));

  router.post("/", (req, res) => {
    const draft = groceryItemInputSchema.parse(req.body);
    res.status(201).json(groceries.add(pathParam(req, "userId"), draft));
  });

  router.delete("/", (req, res) => {
    res.json({ removed: groceries.clear(pathParam(req, "userId")) });
  });

  router.put("/:itemId", (req, res) => {
    const changes = groceryItemInputSchema.partial().parse(req.body);
    res.json(groceries.update(pathParam(req, "userId"), pathParam(req, "itemId"), changes));
  });

  router.post("/:itemId/pin", (req, res) => {
    const { isPinned } = pinBody.parse(req.body);
    res.json(groceries.setPinned(pathParam(req, "userId"), pathParam(req, "itemId"), isPinned));
  });

  router.delete("/:itemId", (req, res) => {
    const itemId = pathParam(req, "itemId");
    if (!groceries.remove(pathParam(req, "userId"), itemId)) {
      throw new NotFoundError(`Grocery item ${itemId} not found`);
    }
    res.status(204).end();
  });

  return router;
}
