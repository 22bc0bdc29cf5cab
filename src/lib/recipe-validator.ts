import { z } from "zod";
import { ValidationError } from "./errors";
import { toDietaryTag } from "./normalize";
import type { Recipe, RecipeRequest } from "./types";

export const MIN_RECIPES = 2;
export const MAX_RECIPES = 3;

const nonEmptyString = z.string().refine((text) => text.trim().length > 0, "must not be blank");

// Older replies used snake_case keys and {ingredient, quantity} items
const RECIPE_KEY_ALIASES: Record<string, string> = {
  recipe_name: "title",
  name: "title",
  nutritional_info: "nutrition",
  dietary_tags: "dietaryTags",
  cooking_time_minutes: "cookingTimeMinutes",
  difficulty_level: "difficulty",
  cooking_tips: "tips",
  allergen_warnings: "allergenWarnings",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function applyAliases(value: unknown): unknown {
  if (!isRecord(value)) return value;
  const out: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    const canonical = RECIPE_KEY_ALIASES[key] ?? key;
    if (!(canonical in out) || canonical === key) out[canonical] = field;
  }
  return out;
}

const IngredientSchema = z.union([
  nonEmptyString,
  z
    .object({
      name: nonEmptyString.optional(),
      ingredient: nonEmptyString.optional(),
      quantity: z.union([z.string(), z.number()]).optional(),
    })
    .transform((item, ctx) => {
      const name = item.name ?? item.ingredient;
      if (!name) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "ingredient name missing" });
        return z.NEVER;
      }
      const quantity = item.quantity === undefined ? "" : String(item.quantity).trim();
      return quantity ? `${quantity} ${name}` : name;
    }),
]);

const NutritionSchema = z
  .record(z.union([z.number(), nonEmptyString]))
  .refine((nutrition) => Object.keys(nutrition).length > 0, "nutrition is empty");

const RecipeSchema = z.preprocess(
  applyAliases,
  z.object({
    title: nonEmptyString,
    ingredients: z.array(IngredientSchema).min(1),
    instructions: z.array(nonEmptyString).min(1),
    nutrition: NutritionSchema,
    dietaryTags: z.array(nonEmptyString).catch([]),
    cookingTimeMinutes: z.number().positive().optional().catch(undefined),
    difficulty: nonEmptyString.optional().catch(undefined),
    servings: z.number().positive().optional().catch(undefined),
    tips: z.array(nonEmptyString).optional().catch(undefined),
    allergenWarnings: z.array(nonEmptyString).optional().catch(undefined),
  })
);

function toRecipe(parsed: z.infer<typeof RecipeSchema>): Recipe {
  const recipe: Recipe = {
    title: parsed.title,
    ingredients: parsed.ingredients,
    instructions: parsed.instructions,
    nutrition: parsed.nutrition,
    dietaryTags: parsed.dietaryTags,
  };
  if (parsed.cookingTimeMinutes !== undefined) recipe.cookingTimeMinutes = parsed.cookingTimeMinutes;
  if (parsed.difficulty !== undefined) recipe.difficulty = parsed.difficulty;
  if (parsed.servings !== undefined) recipe.servings = parsed.servings;
  if (parsed.tips !== undefined) recipe.tips = parsed.tips;
  if (parsed.allergenWarnings !== undefined) recipe.allergenWarnings = parsed.allergenWarnings;
  return recipe;
}

/** True when the recipe's declared tags cover every requested restriction. */
export function satisfiesRestrictions(recipe: Recipe, request: RecipeRequest): boolean {
  const declared = new Set(recipe.dietaryTags.map(toDietaryTag));
  return request.dietaryRestrictions.every((tag) => declared.has(tag));
}

function requireMinimum(recipes: Recipe[], reason: string): void {
  if (recipes.length < MIN_RECIPES) {
    throw new ValidationError(
      "INSUFFICIENT_VALID_RECIPES",
      `Only ${recipes.length} recipe(s) left after ${reason}; need at least ${MIN_RECIPES}`
    );
  }
}

function unwrapList(parsed: unknown): unknown[] | null {
  if (Array.isArray(parsed)) return parsed;
  if (isRecord(parsed) && Array.isArray(parsed.recipes)) return parsed.recipes;
  return null;
}

export type RecipeFilter = (recipe: Recipe, request: RecipeRequest) => boolean;

/**
 * Turns a raw model reply into recipes. `extraFilter` runs after the declared-tag check
 * under the same minimum-count rule.
 */
export function validateRecipes(raw: string, request: RecipeRequest, extraFilter?: RecipeFilter): Recipe[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(
      "MALFORMED_JSON",
      `Model reply is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const list = unwrapList(parsed);
  if (!list || list.length < MIN_RECIPES || list.length > MAX_RECIPES) {
    throw new ValidationError(
      "WRONG_COUNT",
      `Expected an array of ${MIN_RECIPES}-${MAX_RECIPES} recipes, got ${list ? list.length : "no array"}`
    );
  }

  const wellFormed: Recipe[] = [];
  for (const [index, entry] of list.entries()) {
    const result = RecipeSchema.safeParse(entry);
    if (result.success) {
      wellFormed.push(toRecipe(result.data));
    } else {
      console.log(`[validator] dropping recipe #${index + 1}:`, result.error.issues[0]?.message);
    }
  }
  requireMinimum(wellFormed, "dropping incomplete recipes");

  const compliant = wellFormed.filter((recipe) => satisfiesRestrictions(recipe, request));
  requireMinimum(compliant, "dropping recipes that miss a dietary restriction");

  if (!extraFilter) return compliant;

  const verified = compliant.filter((recipe) => extraFilter(recipe, request));
  requireMinimum(verified, "dropping recipes whose ingredients break a dietary restriction");
  return verified;
}
