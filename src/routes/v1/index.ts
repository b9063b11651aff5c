import { Router } from "express";
import type { AppServices } from "../../services/container.js";
import { createCollectionsRouter, createSharedCollectionsRouter } from "./collections.js";
import { createCustomRecipesRouter } from "./customRecipes.js";
import { createGroceriesRouter } from "./groceries.js";
import { createIngredientSearchesRouter } from "./ingredientSearches.js";
import { createMealPlansRouter } from "./mealPlans.js";
import { createPreferencesRouter } from "./preferences.js";
import { createRecipesRouter } from "./recipes.js";

export function createV1Router(services: AppServices): Router {
  const router = Router();

  router.use("/", createRecipesRouter(services));
  router.use("/", createSharedCollectionsRouter(services));
  router.use("/users/:userId/recipes", createCustomRecipesRouter(services));
  router.use("/users/:userId/groceries", createGroceriesRouter(services));
  router.use("/users/:userId/collections", createCollectionsRouter(services));
  router.use("/users/:userId/ingredient-searches", createIngredientSearchesRouter(services));
  router.use("/users/:userId/meal-plans", createMealPlansRouter(services));
  router.use("/users/:userId/preferences", createPreferencesRouter(services));

  return router;
}
