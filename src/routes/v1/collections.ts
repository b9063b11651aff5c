import { Router } from "express";
import { z } from "zod";
import { asyncHandler } from "../../middleware/error.js";
import type { AppServices } from "../../services/container.js";
import { toRecipe } from "../../services/customRecipes.js";
import { collectionInputSchema, collectionUpdateSchema } from "../../types/schemas.js";
import { NotFoundError } from "../../utils/errors.js";
import { pathParam } from "./params.js";

const listQuery = z.object({ recipeId: z.string().trim().min(1).optional() });
const reorderBody = z.object({
  oldIndex: z.number().int().nonnegative(),
  newIndex: z.number().int().nonnegative(),
});
const duplicateBody = z.object({ name: z.string().trim().min(1).max(100) });
const addRecipeBody = z.object({ recipeId: z.string().trim().min(1) });

/** Mounted under /users/:userId/collections. */
export function createCollectionsRouter(services: AppServices): Router {
  const router = Router({ mergeParams: true });
  const collections = services.collections;

  router.get("/", (req, res) => {
    const userId = pathParam(req, "userId");
    const { recipeId } = listQuery.parse(req.query);
    const items = recipeId ? collections.collectionsForRecipe(userId, recipeId) : collections.list(userId);
    res.json({ items });
  });

  router.post("/", (req, res) => {
    const draft = collectionInputSchema.parse(req.body);
    res.status(201).json(collections.create(pathParam(req, "userId"), draft));
  });

  router.post("/reorder", (req, res) => {
    const { oldIndex, newIndex } = reorderBody.parse(req.body);
    res.json({ items: collections.reorder(pathParam(req, "userId"), oldIndex, newIndex) });
  });

  router.put("/:id", (req, res) => {
    const changes = collectionUpdateSchema.parse(req.body);
    res.json(collections.update(pathParam(req, "userId"), pathParam(req, "id"), changes));
  });

  router.delete("/:id", (req, res) => {
    const id = pathParam(req, "id");
    if (!collections.delete(pathParam(req, "userId"), id)) {
      throw new NotFoundError(`Collection ${id} not found`);
    }
    res.status(204).end();
  });

  router.post("/:id/pin", (req, res) => {
    res.json(collections.togglePin(pathParam(req, "userId"), pathParam(req, "id")));
  });

  router.post("/:id/duplicate", (req, res) => {
    const { name } = duplicateBody.parse(req.body);
    res.status(201).json(collections.duplicate(pathParam(req, "userId"), pathParam(req, "id"), name));
  });

  router.get("/:id/recipes", (req, res) => {
    const userId = pathParam(req, "userId");
    const id = pathParam(req, "id");
    res.json({
      items: collections.listRecipes(userId, id),
      coverImages: collections.coverImages(userId, id),
    });
  });

  // The recipe may be one of the user's own or one from the provider.
  router.post("/:id/recipes", asyncHandler(async (req, res) => {
    const userId = pathParam(req, "userId");
    const id = pathParam(req, "id");
    const { recipeId } = addRecipeBody.parse(req.body);

    const custom = services.customRecipes.get(userId, recipeId);
    const recipe = custom ? toRecipe(custom) : await services.cache.getRecipeDetails(recipeId);
    if (!recipe) {
      throw new NotFoundError(`Recipe ${recipeId} not found`);
    }

    const added = collections.addRecipe(userId, id, recipe);
    res.status(added ? 201 : 200).json({ added, recipe });
  }));

  router.delete("/:id/recipes/:recipeId", (req, res) => {
    const recipeId = pathParam(req, "recipeId");
    if (!collections.removeRecipe(pathParam(req, "userId"), pathParam(req, "id"), recipeId)) {
      throw new NotFoundError(`Recipe ${recipeId} is not in this collection`);
    }
    res.status(204).end();
  });

  router.post("/:id/share", (req, res) => {
    res.json(collections.share(pathParam(req, "userId"), pathParam(req, "id")));
  });

  router.delete("/:id/share", (req, res) => {
    res.json(collections.revokeShare(pathParam(req, "userId"), pathParam(req, "id")));
  });

  return router;
}

export function createSharedCollectionsRouter(services: AppServices): Router {
  const router = Router();

  router.get("/shared/collections/:token", (req, res) => {
    const shared = services.collections.getShared(pathParam(req, "token"));
    if (!shared) {
      throw new NotFoundError("Shared collection not found");
    }
    res.json(shared);
  });

  return router;
}
