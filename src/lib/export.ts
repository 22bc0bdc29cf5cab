import type { RatedRecipe, Recipe } from "./types";

export const RECIPE_SEPARATOR = "\n\n---\n\n";

function recipesOf(entries: RatedRecipe[]): Recipe[] {
  return entries.map((entry) => entry.recipe);
}

export function exportJson(entries: RatedRecipe[]): string {
  return JSON.stringify(recipesOf(entries), null, 2);
}

export function formatRecipeText(recipe: Recipe): string {
  return [
    recipe.title,
    "",
    "Ingredients:",
    ...recipe.ingredients.map((ingredient) => `- ${ingredient}`),
    "",
    "Instructions:",
    ...recipe.instructions.map((step, i) => `${i + 1}. ${step}`),
    "",
    "Nutrition:",
    ...Object.entries(recipe.nutrition).map(([name, value]) => `- ${name}: ${value}`),
  ].join("\n");
}

export function exportText(entries: RatedRecipe[]): string {
  if (entries.length === 0) return "";
  return recipesOf(entries).map(formatRecipeText).join(RECIPE_SEPARATOR) + "\n";
}
