import { Router } from "express";
import { z } from "zod";
import type { AppServices } from "../../services/container.js";
import { NotFoundError } from "../../utils/errors.js";
import { pathParam } from "./params.js";

const listQuery = z.object({ limit: z.coerce.number().int().min(1).max(100).default(20) });
const topQuery = z.object({ limit: z.coerce.number().int().min(1).max(50).default(10) });

/** Mounted under /users/:userId/ingredient-searches. */
export function createIngredientSearchesRouter(services: AppServices): Router {
  const router = Router({ mergeParams: true });
  const history = services.ingredientHistory;

  router.get("/", (req, res) => {
    const userId = pathParam(req, "userId");
    const { limit } = listQuery.parse(req.query);
    res.json({ items: history.list(userId, limit), total: history.count(userId) });
  });

  router.get("/top-ingredients", (req, res) => {
    const { limit } = topQuery.parse(req.query);
    res.json({ items: history.mostUsedIngredients(pathParam(req, "userId"), limit) });
  });

  router.delete("/", (req, res) => {
    res.json({ removed: history.clear(pathParam(req, "userId")) });
  });

  router.delete("/:id", (req, res) => {
    const id = pathParam(req, "id");
    if (!history.delete(pathParam(req, "userId"), id)) {
      throw new NotFoundError(`Ingredient search ${id} not found`);
    }
    res.status(204).end();
  });

  return router;
}
