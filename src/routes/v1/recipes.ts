import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../../middleware/error.js";
import type { AppServices } from "../../services/container.js";
import { CANCELLED_MESSAGE } from "../../services/searchOrchestrator.js";
import { NotFoundError } from "../../utils/errors.js";
import { abortOnClose, countQuery, optionalLimit, pathParam, splitList } from "./params.js";

const keywordQuery = z.object({
  q: z.string().default(""),
  limit: optionalLimit,
});

const ingredientQuery = z.object({
  ingredients: z.string().default(""),
  limit: optionalLimit,
  userId: z.string().trim().min(1).optional(),
});

export function createRecipesRouter(services: AppServices): Router {
  const router = Router();

  router.get("/recipes/search", asyncHandler(async (req, res) => {
    const { q, limit } = keywordQuery.parse(req.query);
    const result = await services.search.search(q, { limit, signal: abortOnClose(res) });
    res.json(result);
  }));

  router.get("/recipes/by-ingredients", asyncHandler(async (req, res) => {
    const { ingredients, limit, userId } = ingredientQuery.parse(req.query);
    const names = splitList(ingredients);
    const result = await services.search.search(names, { limit, signal: abortOnClose(res) });

    if (userId && result.message !== CANCELLED_MESSAGE) {
      services.ingredientHistory.record(userId, names, result.recipes.length);
    }
    res.json(result);
  }));

  router.get("/recipes/random", asyncHandler(async (req, res) => {
    const { number } = countQuery(10).parse(req.query);
    const recipes = await services.discovery.getRandomRecipes(number, abortOnClose(res));
    await services.cache.remember(recipes);
    res.json({ items: recipes });
  }));

  router.get("/recipes/:id", asyncHandler(async (req, res) => {
    const id = pathParam(req, "id");
    const recipe = await services.cache.getRecipeDetails(id);
    if (!recipe) {
      throw new NotFoundError(`Recipe ${id} not found`);
    }
    res.json(recipe);
  }));

  router.get("/recipes/:id/similar", asyncHandler(async (req, res) => {
    const { number } = countQuery(5).parse(req.query);
    const recipes = await services.discovery.getSimilarRecipes(pathParam(req, "id"), number, abortOnClose(res));
    await services.cache.remember(recipes);
    res.json({ items: recipes });
  }));

  router.get("/cache/stats", asyncHandler(async (_req, res) => {
    res.json(await services.cache.getCacheStats());
  }));

  return router;
}
