import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../../middleware/error.js";
import type { AppServices } from "../../services/container.js";
import { customRecipeInputSchema } from "../../types/schemas.js";
import { NotFoundError } from "../../utils/errors.js";
import { pathParam } from "./params.js";

const listQuery = z.object({
  category: z.string().trim().min(1).optional(),
  tag: z.string().trim().min(1).optional(),
  q: z.string().optional(),
});

const importBody = z.object({ url: z.string().url() });

/** Mounted under /users/:userId/recipes. */
export function createCustomRecipesRouter(services: AppServices): Router {
  const router = Router({ mergeParams: true });
  const recipes = services.customRecipes;

  router.get("/", (req, res) => {
    const userId = pathParam(req, "userId");
    const { category, tag, q } = listQuery.parse(req.query);

    const items = category
      ? recipes.listByCategory(userId, category)
      : tag
        ? recipes.listByTag(userId, tag)
        : q !== undefined
          ? recipes.search(userId, q)
          : recipes.list(userId);
    res.json({ items, total: items.length });
  });

  router.get("/grouped", (req, res) => {
    res.json({ groups: recipes.groupByCategory(pathParam(req, "userId")) });
  });

  router.post("/", (req, res) => {
    const draft = customRecipeInputSchema.parse(req.body);
    res.status(201).json(recipes.create(pathParam(req, "userId"), draft));
  });

  router.post("/import", asyncHandler(async (req, res) => {
    const userId = pathParam(req, "userId");
    const { url } = importBody.parse(req.body);
    const draft = await services.importRecipe(url);
    res.status(201).json(recipes.create(userId, draft));
  }));

  router.get("/:recipeId", (req, res) => {
    const recipeId = pathParam(req, "recipeId");
    const recipe = recipes.get(pathParam(req, "userId"), recipeId);
    if (!recipe) {
      throw new NotFoundError(`Recipe ${recipeId} not found`);
    }
    res.json(recipe);
  });

  router.put("/:recipeId", (req, res) => {
    const draft = customRecipeInputSchema.parse(req.body);
    res.json(recipes.update(pathParam(req, "userId"), pathParam(req, "recipeId"), draft));
  });

  router.delete("/:recipeId", (req, res) => {
    const recipeId = pathParam(req, "recipeId");
    if (!recipes.delete(pathParam(req, "userId"), recipeId)) {
      throw new NotFoundError(`Recipe ${recipeId} not found`);
    }
    res.status(204).end();
  });

  return router;
}
