import type { CustomRecipeDraft, InstructionStep } from "../types/contracts.js";
import { customRecipeInputSchema } from "../types/schemas.js";
import { AppError, isAbortError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { parseIngredientLines } from "./ingredientParser.js";
import type { FetchLike } from "./spoonacular.js";

export type RecipeImportErrorCode =
  | "network_error"
  | "timeout"
  | "invalid_html"
  | "recipe_not_found"
  | "missing_ingredients"
  | "missing_instructions"
  | "invalid_recipe";

export class RecipeImportError extends AppError {
  readonly importCode: RecipeImportErrorCode;

  constructor(message: string, importCode: RecipeImportErrorCode, cause?: unknown) {
    super(message, importCode === "timeout" ? 504 : 422, `import_${importCode}`, { cause });
    this.importCode = importCode;
  }
}

type RecipeNode = Record<string, unknown>;

export type RecipeImportOptions = {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  userAgent?: string;
};

const DEFAULT_TIMEOUT_MS = 8_000;
const DEFAULT_USER_AGENT = "RecipeSearchBot/1.0";
const MAX_TITLE_LENGTH = 200;
const MAX_DESCRIPTION_LENGTH = 5_000;

const log = createChildLogger({ service: "recipe-import" });

export async function importRecipeFromURL(url: string, options: RecipeImportOptions = {}): Promise<CustomRecipeDraft> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  let html: string;
  try {
    const response = await fetchImpl(url, {
      method: "GET",
      headers: {
        "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: "text/html,application/xhtml+xml",
      },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new RecipeImportError(`Fetch failed with status ${response.status}`, "network_error");
    }

    html = await response.text();
  } catch (error) {
    if (error instanceof RecipeImportError) {
      throw error;
    }
    if (isAbortError(error)) {
      throw new RecipeImportError("Recipe page timed out", "timeout", error);
    }
    throw new RecipeImportError("Failed to fetch recipe page", "network_error", error);
  } finally {
    clearTimeout(timeout);
  }

  const draft = parseRecipeFromHTML(url, html);
  log.info({ msg: "Imported recipe", url, title: draft.title, ingredients: draft.ingredients.length });
  return draft;
}

export function parseRecipeFromHTML(url: string, html: string): CustomRecipeDraft {
  if (!html.trim()) {
    throw new RecipeImportError("Empty HTML payload", "invalid_html");
  }

  const node = extractRecipeNode(html);
  if (!node) {
    throw new RecipeImportError("Recipe schema not found", "recipe_not_found");
  }

  const ingredients = parseIngredientLines(toLines(node.recipeIngredient));
  if (ingredients.length === 0) {
    throw new RecipeImportError("Recipe has no ingredients", "missing_ingredients");
  }

  const instructions = normalizeInstructions(node.recipeInstructions);
  if (instructions.length === 0) {
    throw new RecipeImportError("Recipe has no instructions", "missing_instructions");
  }

  const title = nonEmptyString(node.name) ?? extractTitleFromHTML(html) ?? "Imported recipe";

  const draft: CustomRecipeDraft = {
    title: title.slice(0, MAX_TITLE_LENGTH),
    description: nonEmptyString(node.description)?.slice(0, MAX_DESCRIPTION_LENGTH),
    imageUrl: resolveURL(extractImageURL(node.image), url),
    ingredients,
    instructions,
    servings: positiveInt(parseNumberFromUnknown(firstOf(node.recipeYield))),
    prepTime: parseDurationToMinutes(node.prepTime),
    cookTime: parseDurationToMinutes(node.cookTime),
    category: toStringArray(node.recipeCategory)[0],
    tags: normalizeTags(node.keywords, node.recipeCuisine),
    isPublic: false,
    source: "url",
    sourceUrl: new URL(url).toString(),
    vegetarian: false,
    vegan: false,
    glutenFree: false,
    dairyFree: false,
  };

  // Imported drafts are saved without passing the request schema.
  const checked = customRecipeInputSchema.safeParse(draft);
  if (!checked.success) {
    const fields = checked.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new RecipeImportError(`Imported recipe has invalid fields: ${fields}`, "invalid_recipe", checked.error);
  }
  return draft;
}

function extractRecipeNode(html: string): RecipeNode | null {
  const matches = html.match(/<script[^>]*type=["']application\/ld\+json["'][^>]*>([\s\S]*?)<\/script>/gi) ?? [];
  for (const match of matches) {
    const payload = match.match(/>([\s\S]*?)<\/script>/i)?.[1]?.trim();
    if (!payload) {
      continue;
    }

    const recipe = findRecipeNode(safeParseJSONLD(payload));
    if (recipe) {
      return recipe;
    }
  }

  return null;
}

function safeParseJSONLD(raw: string): unknown {
  const normalized = raw
    .replace(/^\uFEFF/, "")
    .replace(/<!--/g, "")
    .replace(/-->/g, "")
    .trim();

  try {
    return JSON.parse(normalized);
  } catch (error) {
    log.debug({ msg: "Skipping unparsable JSON-LD block", error: String(error) });
    return null;
  }
}

function findRecipeNode(value: unknown): RecipeNode | null {
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = findRecipeNode(item);
      if (found) {
        return found;
      }
    }
    return null;
  }

  if (!isRecord(value)) {
    return null;
  }

  if (isRecipeType(value["@type"])) {
    return value;
  }

  return findRecipeNode(value["@graph"]) ?? findRecipeNode(value.mainEntity);
}

function isRecipeType(value: unknown): boolean {
  if (typeof value === "string") {
    return value.toLowerCase() === "recipe";
  }
  if (Array.isArray(value)) {
    return value.some((item) => typeof item === "string" && item.toLowerCase() === "recipe");
  }
  return false;
}

function toLines(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string");
  }
  if (typeof value === "string") {
    return value.split(/\r?\n|;/g);
  }
  return [];
}

// HowToSection entries carry their steps in itemListElement.
function normalizeInstructions(value: unknown): InstructionStep[] {
  const texts = collectInstructionTexts(value);
  return texts.map((step, index) => ({ number: index + 1, step }));
}

function collectInstructionTexts(value: unknown): string[] {
  if (typeof value === "string") {
    return value
      .split(/\r?\n/g)
      .map((item) => stripTags(item))
      .filter((item) => item.length > 0);
  }

  if (Array.isArray(value)) {
    return value.flatMap(collectInstructionTexts);
  }

  if (isRecord(value)) {
    if (value.itemListElement) {
      return collectInstructionTexts(value.itemListElement);
    }
    const text = nonEmptyString(value.text) ?? nonEmptyString(value.name);
    return text ? [stripTags(text)] : [];
  }

  return [];
}

function extractImageURL(value: unknown): string | null {
  if (typeof value === "string") {
    return nonEmptyString(value);
  }

  if (Array.isArray(value)) {
    for (const item of value) {
      const candidate = extractImageURL(item);
      if (candidate) {
        return candidate;
      }
    }
    return null;
  }

  if (isRecord(value)) {
    return nonEmptyString(value.url);
  }

  return null;
}

function resolveURL(value: string | null, base: string): string | undefined {
  if (!value) {
    return undefined;
  }
  try {
    return new URL(value, base).toString();
  } catch {
    return undefined;
  }
}

function normalizeTags(...values: unknown[]): string[] {
  const tags = values
    .flatMap(toStringArray)
    .map((item) => item.toLowerCase());
  return Array.from(new Set(tags));
}

function toStringArray(value: unknown): string[] {
  const items = typeof value === "string"
    ? value.split(",")
    : Array.isArray(value)
      ? value.filter((item): item is string => typeof item === "string")
      : [];
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}

function firstOf(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

function parseNumberFromUnknown(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value !== "string") {
    return undefined;
  }

  const match = value.match(/\d+([.,]\d+)?/);
  if (!match) {
    return undefined;
  }
  const parsed = Number(match[0].replace(",", "."));
  return Number.isFinite(parsed) ? parsed : undefined;
}

function positiveInt(value: number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const rounded = Math.round(value);
  return rounded > 0 ? rounded : undefined;
}

/** ISO 8601 durations such as "PT1H15M". Seconds round up to a minute. */
export function parseDurationToMinutes(value: unknown): number | undefined {
  if (typeof value !== "string" || value.length === 0) {
    return undefined;
  }

  const match = value.toUpperCase().match(/^P(?:(\d+)D)?T?(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/);
  if (!match) {
    return undefined;
  }

  const days = Number(match[1] ?? "0");
  const hours = Number(match[2] ?? "0");
  const minutes = Number(match[3] ?? "0");
  const seconds = Number(match[4] ?? "0");

  const total = days * 24 * 60 + hours * 60 + minutes + (seconds > 0 ? 1 : 0);
  return total > 0 ? total : undefined;
}

function extractTitleFromHTML(html: string): string | null {
  const title = html.match(/<title[^>]*>([\s\S]*?)<\/title>/i)?.[1];
  return nonEmptyString(title);
}

function stripTags(value: string): string {
  return value.replace(/<[^>]*>/g, " ").replace(/\s+/g, " ").trim();
}

function nonEmptyString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const normalized = value.trim();
  return normalized.length > 0 ? normalized : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
