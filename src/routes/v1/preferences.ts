import { Router } from "express";
import type { AppServices } from "../../services/container.js";
import { maxReadyTime } from "../../services/preferences.js";
import { userPreferencesInputSchema } from "../../types/schemas.js";
import { NotFoundError } from "../../utils/errors.js";
import { pathParam } from "./params.js";

/** Mounted under /users/:userId/preferences. */
export function createPreferencesRouter(services: AppServices): Router {
  const router = Router({ mergeParams: true });
  const preferences = services.preferences;

  router.get("/", (req, res) => {
    const userId = pathParam(req, "userId");
    const saved = preferences.get(userId);
    if (!saved) {
      throw new NotFoundError(`No preferences saved for ${userId}`);
    }
    res.json({ ...saved, maxReadyTime: maxReadyTime(saved) });
  });

  router.put("/", (req, res) => {
    const draft = userPreferencesInputSchema.parse(req.body);
    res.json(preferences.save(pathParam(req, "userId"), draft));
  });

  router.patch("/", (req, res) => {
    const changes = userPreferencesInputSchema.partial().parse(req.body);
    res.json(preferences.update(pathParam(req, "userId"), changes));
  });

  router.delete("/", (req, res) => {
    const userId = pathParam(req, "userId");
    if (!preferences.clear(userId)) {
      throw new NotFoundError(`No preferences saved for ${userId}`);
    }
    res.status(204).end();
  });

  router.get("/onboarding", (req, res) => {
    res.json({ completed: preferences.hasCompletedOnboarding(pathParam(req, "userId")) });
  });

  router.post("/onboarding", (req, res) => {
    const saved = preferences.markOnboardingComplete(pathParam(req, "userId"));
    res.json({ completed: true, preferences: saved });
  });

  return router;
}
