import type { Ingredient } from "../types/contracts.js";

const UNIT_ALIASES: Record<string, string> = {
  cup: "cups",
  cups: "cups",
  c: "cups",
  tablespoon: "tbsp",
  tablespoons: "tbsp",
  tbsp: "tbsp",
  tbs: "tbsp",
  teaspoon: "tsp",
  teaspoons: "tsp",
  tsp: "tsp",
  pound: "lbs",
  pounds: "lbs",
  lb: "lbs",
  lbs: "lbs",
  ounce: "oz",
  ounces: "oz",
  oz: "oz",
  gram: "g",
  grams: "g",
  g: "g",
  kilogram: "kg",
  kilograms: "kg",
  kg: "kg",
  piece: "pieces",
  pieces: "pieces",
  pcs: "pieces",
  liter: "L",
  liters: "L",
  litre: "L",
  litres: "L",
  l: "L",
  milliliter: "mL",
  milliliters: "mL",
  millilitre: "mL",
  millilitres: "mL",
  ml: "mL",
};

const UNICODE_FRACTIONS: Record<string, number> = {
  "½": 0.5,
  "⅓": 1 / 3,
  "⅔": 2 / 3,
  "¼": 0.25,
  "¾": 0.75,
};

// Mixed numbers and fractions are tried before plain numbers.
const QUANTITY_RE = /^(\d+\s+\d+\/\d+|\d+\/\d+|\d+(?:[.,]\d+)?|[½⅓⅔¼¾])\s*/;
const UNIT_RE = /^([a-zA-Z]+)\.?(?=\s|$)/;
const BRACKET_RE = /\([^)]*\)/g;
const EXTRA_WORDS_RE = /\b(to taste|for serving|for garnish|chopped|minced|diced|sliced|peeled|finely|roughly|freshly)\b/gi;

/** Splits an ingredient line such as "1 1/2 cups flour" into amount, unit and name. */
export function parseIngredientLine(raw: string): Ingredient {
  const original = raw.trim().replace(/\s+/g, " ");
  let rest = original;

  let amount: number | undefined;
  const quantityMatch = rest.match(QUANTITY_RE);
  if (quantityMatch?.[1]) {
    amount = parseQuantity(quantityMatch[1]);
    rest = rest.slice(quantityMatch[0].length);
  }

  let unit: string | undefined;
  const unitMatch = rest.match(UNIT_RE);
  const alias = unitMatch?.[1] ? UNIT_ALIASES[unitMatch[1].toLowerCase()] : undefined;
  if (unitMatch && alias) {
    unit = alias;
    rest = rest.slice(unitMatch[0].length);
  }

  const name = (rest.split(",")[0] ?? "")
    .replace(BRACKET_RE, " ")
    .replace(/^\s*of\s+/i, " ")
    .replace(EXTRA_WORDS_RE, " ")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();

  return {
    original,
    name: name || undefined,
    amount,
    unit,
  };
}

export function parseIngredientLines(lines: readonly string[]): Ingredient[] {
  return lines
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map(parseIngredientLine);
}

function parseQuantity(token: string): number | undefined {
  const unicode = UNICODE_FRACTIONS[token];
  if (unicode !== undefined) {
    return round3(unicode);
  }

  const parts = token.split(/\s+/);
  let total = 0;
  for (const part of parts) {
    if (part.includes("/")) {
      const [numerator, denominator] = part.split("/").map(Number);
      if (numerator === undefined || denominator === undefined || !denominator) {
        return undefined;
      }
      total += numerator / denominator;
    } else {
      const value = Number(part.replace(",", "."));
      if (!Number.isFinite(value)) {
        return undefined;
      }
      total += value;
    }
  }

  return round3(total);
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}
