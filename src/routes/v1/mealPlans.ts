import { Router } from "express";
import type { AppServices } from "../../services/container.js";
import { mealPlanInputSchema } from "../../types/schemas.js";
import { NotFoundError } from "../../utils/errors.js";
import { pathParam } from "./params.js";

/** Mounted under /users/:userId/meal-plans. */
export function createMealPlansRouter(services: AppServices): Router {
  const router = Router({ mergeParams: true });
  const mealPlans = services.mealPlans;

  router.get("/", (req, res) => {
    const items = mealPlans.list(pathParam(req, "userId"));
    res.json({ items, total: items.length });
  });

  router.post("/", (req, res) => {
    const draft = mealPlanInputSchema.parse(req.body);
    res.status(201).json(mealPlans.save(pathParam(req, "userId"), draft));
  });

  router.get("/:planId", (req, res) => {
    const planId = pathParam(req, "planId");
    const plan = mealPlans.get(pathParam(req, "userId"), planId);
    if (!plan) {
      throw new NotFoundError(`Meal plan ${planId} not found`);
    }
    res.json(plan);
  });

  router.delete("/:planId", (req, res) => {
    const planId = pathParam(req, "planId");
    if (!mealPlans.delete(pathParam(req, "userId"), planId)) {
      throw new NotFoundError(`Meal plan ${planId} not found`);
    }
    res.status(204).end();
  });

  return router;
}
