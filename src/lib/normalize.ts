import { ValidationError } from "./errors";
import {
  CUISINES,
  DIETARY_TAGS,
  DIFFICULTIES,
  type Cuisine,
  type DietaryTag,
  type Difficulty,
  type RecipeRequest,
} from "./types";

/** Form selections as they arrive from the client. */
export interface RecipeOptionsInput {
  dietaryRestrictions?: string[];
  cuisine?: string;
  difficulty?: string;
  maxCookingMinutes?: number;
  notes?: string;
}

/** "Gluten Free", "gluten-free" and "GLUTEN_FREE" all share the key "glutenfree". */
export function optionKey(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, "");
}

function buildLookup<T extends string>(values: readonly T[]): Map<string, T> {
  return new Map(values.map((value) => [optionKey(value), value]));
}

const dietaryLookup = buildLookup(DIETARY_TAGS);
const cuisineLookup = buildLookup(CUISINES);
const difficultyLookup = buildLookup(DIFFICULTIES);

export function toDietaryTag(value: string): DietaryTag | undefined {
  return dietaryLookup.get(optionKey(value));
}

export function parseIngredients(raw: string): string[] {
  const seen = new Set<string>();
  const ingredients: string[] = [];

  for (const token of raw.split(",")) {
    const ingredient = token.trim();
    if (!ingredient) continue;
    const key = ingredient.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    ingredients.push(ingredient);
  }

  return ingredients;
}

export function normalize(rawIngredients: string, options: RecipeOptionsInput = {}): RecipeRequest {
  const ingredients = parseIngredients(rawIngredients);
  if (ingredients.length === 0) {
    throw new ValidationError("EMPTY_INGREDIENTS", "Please enter at least one ingredient");
  }

  // Unknown tags are ignored so older clients keep working as options change
  const selected = new Set<DietaryTag>();
  for (const option of options.dietaryRestrictions ?? []) {
    const tag = toDietaryTag(option);
    if (tag) selected.add(tag);
  }
  const dietaryRestrictions = DIETARY_TAGS.filter((tag) => selected.has(tag));

  const cuisine: Cuisine | undefined = options.cuisine
    ? cuisineLookup.get(optionKey(options.cuisine))
    : undefined;
  const difficulty: Difficulty =
    (options.difficulty && difficultyLookup.get(optionKey(options.difficulty))) || "Any";

  const request: RecipeRequest = { ingredients, dietaryRestrictions, difficulty };
  if (cuisine) request.cuisine = cuisine;

  const { maxCookingMinutes } = options;
  if (typeof maxCookingMinutes === "number" && Number.isInteger(maxCookingMinutes) && maxCookingMinutes > 0) {
    request.maxCookingMinutes = maxCookingMinutes;
  }

  const notes = options.notes?.trim();
  if (notes) request.notes = notes;

  return request;
}
