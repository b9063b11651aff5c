import type { CustomRecipeDraft } from "../types/contracts.js";
import { CacheMaintenance } from "./cacheMaintenance.js";
import { CollectionService } from "./collections.js";
import { CustomRecipeService } from "./customRecipes.js";
import type { SQLiteDatabase } from "./database.js";
import { GroceryService } from "./groceries.js";
import { IngredientHistoryService } from "./ingredientHistory.js";
import { MealPlanService } from "./mealPlans.js";
import { UserPreferenceService } from "./preferences.js";
import { RecipeCacheService } from "./recipeCache.js";
import { importRecipeFromURL, type RecipeImportOptions } from "./recipeImport.js";
import { SqliteRecipeStore } from "./recipeStore.js";
import { SearchOrchestrator } from "./searchOrchestrator.js";
import type { RecipeDetailsProvider, RecipeDiscoveryProvider, RemoteRecipeProvider } from "./spoonacular.js";

export type RecipeProvider = RemoteRecipeProvider & RecipeDetailsProvider & RecipeDiscoveryProvider;

export type ServiceOptions = {
  db: SQLiteDatabase;
  provider: RecipeProvider;
  defaultLimit?: number;
  detailBatchSize?: number;
  detailBatchDelayMs?: number;
  /** Fetch full details for newly cached recipes right away. */
  prefetchDetails?: boolean;
  maintenanceIntervalMs?: number;
  importOptions?: RecipeImportOptions;
  now?: () => Date;
};

export type AppServices = {
  db: SQLiteDatabase;
  discovery: RecipeDiscoveryProvider;
  search: SearchOrchestrator;
  cache: RecipeCacheService;
  maintenance: CacheMaintenance;
  customRecipes: CustomRecipeService;
  groceries: GroceryService;
  collections: CollectionService;
  ingredientHistory: IngredientHistoryService;
  mealPlans: MealPlanService;
  preferences: UserPreferenceService;
  importRecipe: (url: string) => Promise<CustomRecipeDraft>;
};

export function createServices(options: ServiceOptions): AppServices {
  const { db, provider, now } = options;
  const store = new SqliteRecipeStore(db);
  const cache = new RecipeCacheService({
    store,
    provider,
    batchSize: options.detailBatchSize,
    batchDelayMs: options.detailBatchDelayMs,
    prefetchOnCache: options.prefetchDetails,
  });

  return {
    db,
    discovery: provider,
    search: new SearchOrchestrator({
      provider,
      store,
      defaultLimit: options.defaultLimit,
      onCached: (recipes) => cache.schedulePrefetch(recipes),
    }),
    cache,
    maintenance: new CacheMaintenance({ cache, intervalMs: options.maintenanceIntervalMs }),
    customRecipes: new CustomRecipeService(db, now),
    groceries: new GroceryService(db, now),
    collections: new CollectionService(db, now),
    ingredientHistory: new IngredientHistoryService(db, now),
    mealPlans: new MealPlanService(db, now),
    preferences: new UserPreferenceService(db, now),
    importRecipe: (url) => importRecipeFromURL(url, options.importOptions),
  };
}
