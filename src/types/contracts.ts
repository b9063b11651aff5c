export type Ingredient = {
  /** Free-text line as the source wrote it, e.g. "2 cups flour". */
  original: string;
  name?: string;
  amount?: number;
  unit?: string;
};

export type InstructionStep = {
  number: number;
  step: string;
};

export type IngredientMatch = {
  usedIngredientCount: number;
  missedIngredientCount: number;
};

export type DietaryFlags = {
  vegetarian: boolean;
  vegan: boolean;
  glutenFree: boolean;
  dairyFree: boolean;
};

export type Recipe = DietaryFlags & {
  id: string;
  title: string;
  imageUrl?: string;
  readyInMinutes?: number;
  servings?: number;
  summary?: string;
  sourceUrl?: string;
  ingredients: Ingredient[];
  instructions: InstructionStep[];
  ingredientMatch?: IngredientMatch;
};

/** A keyword string or an ordered list of ingredient names. */
export type SearchQuery = string | readonly string[];

export type SearchProvenance = "live" | "cached" | "empty";

export type SearchResult = {
  recipes: Recipe[];
  provenance: SearchProvenance;
  message?: string;
};

export type SearchOptions = {
  limit?: number;
  signal?: AbortSignal;
};

export type CacheStats = {
  total: number;
  withDetails: number;
  basicOnly: number;
  cachePercentage: number;
};

// ── user data ──────────────────────────────────────────────────────────────

export type CustomRecipeSource = "manual" | "url" | "ocr";

export type CustomRecipe = DietaryFlags & {
  id: string;
  userId: string;
  title: string;
  description?: string;
  imageUrl?: string;
  ingredients: Ingredient[];
  instructions: InstructionStep[];
  servings?: number;
  prepTime?: number;
  cookTime?: number;
  /** Prep plus cook time, absent when neither is known. */
  totalTime?: number;
  category?: string;
  tags: string[];
  createdAt: string;
  updatedAt?: string;
  isPublic: boolean;
  source: CustomRecipeSource;
  sourceUrl?: string;
};

export type CustomRecipeDraft = Omit<CustomRecipe, "id" | "userId" | "createdAt" | "updatedAt" | "totalTime"> & {
  id?: string;
};

export const GROCERY_CATEGORIES = [
  "vegetables",
  "fruits",
  "meat",
  "seafood",
  "dairy",
  "grains",
  "spices",
  "condiments",
  "beverages",
  "other",
] as const;

export type GroceryCategory = (typeof GROCERY_CATEGORIES)[number];

export type GroceryItem = {
  id: string;
  name: string;
  category?: GroceryCategory;
  quantity?: number;
  unit?: string;
  addedAt: string;
  isPinned: boolean;
};

export type CoverImageType = "grid" | "first" | "custom";

export type RecipeCollection = {
  id: string;
  name: string;
  description?: string;
  icon: string;
  color: string;
  coverImageType: CoverImageType;
  customCoverUrl?: string;
  isPinned: boolean;
  isDefault: boolean;
  sortOrder: number;
  recipeCount: number;
  createdAt: string;
  updatedAt: string;
  shareToken?: string;
  isPublic: boolean;
};

export type IngredientSearch = {
  id: string;
  userId: string;
  ingredients: string[];
  recipeCount: number;
  createdAt: string;
};

export type IngredientUsage = {
  name: string;
  count: number;
};

export const DIETARY_RESTRICTIONS = [
  "vegetarian",
  "vegan",
  "glutenFree",
  "dairyFree",
  "ketogenic",
  "paleo",
  "pescatarian",
  "whole30",
] as const;

export type DietaryRestriction = (typeof DIETARY_RESTRICTIONS)[number];

export const CUISINES = [
  "african",
  "american",
  "british",
  "cajun",
  "caribbean",
  "chinese",
  "eastern european",
  "european",
  "french",
  "german",
  "greek",
  "indian",
  "irish",
  "italian",
  "japanese",
  "jewish",
  "korean",
  "latin american",
  "mediterranean",
  "mexican",
  "middle eastern",
  "nordic",
  "southern",
  "spanish",
  "thai",
  "vietnamese",
] as const;

export type Cuisine = (typeof CUISINES)[number];

export const SKILL_LEVELS = ["beginner", "intermediate", "advanced"] as const;

export type SkillLevel = (typeof SKILL_LEVELS)[number];

export const MEAL_TYPES = [
  "breakfast",
  "brunch",
  "lunch",
  "dinner",
  "snack",
  "dessert",
  "appetizer",
  "salad",
  "soup",
  "beverage",
  "sauce",
  "marinade",
  "bread",
] as const;

export type MealType = (typeof MEAL_TYPES)[number];

export type UserPreferences = {
  dietaryRestrictions: DietaryRestriction[];
  cuisinePreferences: Cuisine[];
  skillLevel: SkillLevel;
  mealTypePreferences: MealType[];
  createdAt: string;
  updatedAt?: string;
};

export type UserPreferencesDraft = Omit<UserPreferences, "createdAt" | "updatedAt">;

/** A saved set of recipes with the ingredients they were found for. */
export type MealPlan = {
  id: string;
  userId: string;
  name: string;
  recipeIds: string[];
  ingredients: string[];
  createdAt: string;
};
