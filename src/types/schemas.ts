import { z } from "zod";
import {
  CUISINES,
  DIETARY_RESTRICTIONS,
  GROCERY_CATEGORIES,
  MEAL_TYPES,
  SKILL_LEVELS,
  type CustomRecipe,
  type GroceryItem,
  type Ingredient,
  type InstructionStep,
  type Recipe,
  type RecipeCollection,
  type UserPreferences,
} from "./contracts.js";

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const positiveInt = z.number().int().positive();

export const ingredientSchema: Schema<Ingredient> = z.object({
  original: z.string().trim().min(1),
  name: z.string().optional(),
  amount: z.number().nonnegative().optional(),
  unit: z.string().optional(),
});

export const instructionStepSchema: Schema<InstructionStep> = z.object({
  number: positiveInt,
  step: z.string().trim().min(1),
});

const dietaryFlags = {
  vegetarian: z.boolean().default(false),
  vegan: z.boolean().default(false),
  glutenFree: z.boolean().default(false),
  dairyFree: z.boolean().default(false),
};

/** Steps must be numbered in ascending order, starting at 1. */
const instructionList = z
  .array(instructionStepSchema)
  .default([])
  .refine(
    (steps) => steps.every((step, index) => index === 0 ? step.number === 1 : step.number > (steps[index - 1]?.number ?? 0)),
    { message: "instruction steps must be strictly increasing from 1" }
  );

export const recipeSchema: Schema<Recipe> = z.object({
  id: z.string().min(1),
  title: z.string().trim().min(1),
  imageUrl: z.string().optional(),
  readyInMinutes: positiveInt.optional(),
  servings: positiveInt.optional(),
  summary: z.string().optional(),
  sourceUrl: z.string().optional(),
  ingredients: z.array(ingredientSchema).default([]),
  instructions: instructionList,
  ingredientMatch: z
    .object({
      usedIngredientCount: z.number().int().nonnegative(),
      missedIngredientCount: z.number().int().nonnegative(),
    })
    .optional(),
  ...dietaryFlags,
});

const customRecipeFields = {
  title: z.string().trim().min(1).max(200),
  description: z.string().max(5_000).optional(),
  imageUrl: z.string().url().optional(),
  ingredients: z.array(ingredientSchema).default([]),
  instructions: instructionList,
  servings: positiveInt.optional(),
  prepTime: z.number().int().nonnegative().optional(),
  cookTime: z.number().int().nonnegative().optional(),
  category: z.string().trim().min(1).optional(),
  tags: z.array(z.string().trim().min(1)).default([]),
  isPublic: z.boolean().default(false),
  source: z.enum(["manual", "url", "ocr"]).default("manual"),
  sourceUrl: z.string().url().optional(),
  ...dietaryFlags,
};

export const customRecipeInputSchema = z.object({
  id: z.string().uuid().optional(),
  ...customRecipeFields,
});

export type CustomRecipeInput = z.input<typeof customRecipeInputSchema>;

export const customRecipeSchema: Schema<CustomRecipe> = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  createdAt: z.string(),
  updatedAt: z.string().optional(),
  totalTime: z.number().int().nonnegative().optional(),
  ...customRecipeFields,
});

export const groceryCategorySchema = z.enum(GROCERY_CATEGORIES);

export const groceryItemInputSchema = z.object({
  name: z.string().trim().min(1).max(200),
  category: groceryCategorySchema.optional(),
  quantity: z.number().positive().optional(),
  unit: z.string().trim().min(1).optional(),
  isPinned: z.boolean().default(false),
});

export type GroceryItemInput = z.input<typeof groceryItemInputSchema>;

export const groceryItemSchema: Schema<GroceryItem> = groceryItemInputSchema.extend({
  id: z.string().min(1),
  addedAt: z.string(),
});

const hexColor = z.string().regex(/^#[0-9A-Fa-f]{6}$/);

export const collectionInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().max(1_000).optional(),
  icon: z.string().trim().min(1).default("favorite"),
  color: hexColor.default("#FF4757"),
  coverImageType: z.enum(["grid", "first", "custom"]).default("grid"),
  customCoverUrl: z.string().url().optional(),
  isPinned: z.boolean().default(false),
});

export type CollectionInput = z.input<typeof collectionInputSchema>;

export const collectionUpdateSchema = collectionInputSchema.partial();

export const collectionSchema: Schema<RecipeCollection> = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  icon: z.string(),
  color: z.string(),
  coverImageType: z.enum(["grid", "first", "custom"]),
  customCoverUrl: z.string().optional(),
  isPinned: z.boolean(),
  isDefault: z.boolean(),
  sortOrder: z.number().int(),
  recipeCount: z.number().int().nonnegative(),
  createdAt: z.string(),
  updatedAt: z.string(),
  shareToken: z.string().optional(),
  isPublic: z.boolean(),
});

export const userPreferencesInputSchema = z.object({
  dietaryRestrictions: z.array(z.enum(DIETARY_RESTRICTIONS)).default([]),
  cuisinePreferences: z.array(z.enum(CUISINES)).default([]),
  skillLevel: z.enum(SKILL_LEVELS).default("intermediate"),
  mealTypePreferences: z.array(z.enum(MEAL_TYPES)).default([]),
});

export const userPreferencesSchema: Schema<UserPreferences> = userPreferencesInputSchema.extend({
  createdAt: z.string(),
  updatedAt: z.string().optional(),
});

export const mealPlanInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  recipeIds: z.array(z.string().trim().min(1)).min(1).max(50),
  ingredients: z.array(z.string().trim().min(1)).default([]),
});

export type MealPlanInput = z.input<typeof mealPlanInputSchema>;

export function decodeJSON<T>(raw: string, schema: Schema<T>): T | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = schema.safeParse(parsed);
  return result.success ? result.data : null;
}
