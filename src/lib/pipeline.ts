import { verifyIngredients } from "./dietary-verifier";
import type { RecipeGenerator } from "./llm-providers/types";
import { normalize, type RecipeOptionsInput } from "./normalize";
import { buildRecipePrompt } from "./recipe-prompt";
import { validateRecipes } from "./recipe-validator";
import type { SessionStore } from "./session-store";
import type { RatedRecipe, RecipeRequest } from "./types";

export interface PipelineDeps {
  generator: RecipeGenerator;
  store: SessionStore;
  verifyDietaryIngredients: boolean;
}

export interface GenerationResult {
  request: RecipeRequest;
  prompt: string;
  rawResponse: string;
  recipes: RatedRecipe[];
}

/**
 * One form submission: normalize, prompt, call the model, validate, store.
 * Any failure leaves the session's previous recipes untouched.
 */
export async function generateForSession(
  deps: PipelineDeps,
  sessionId: string,
  rawIngredients: string,
  options: RecipeOptionsInput
): Promise<GenerationResult> {
  const request = normalize(rawIngredients, options);
  const prompt = buildRecipePrompt(request);

  console.log(
    `[recipes] generating for ${request.ingredients.length} ingredient(s), restrictions: ${
      request.dietaryRestrictions.join(", ") || "none"
    }`
  );

  const rawResponse = await deps.generator.generate(prompt);
  const recipes = validateRecipes(
    rawResponse,
    request,
    deps.verifyDietaryIngredients ? verifyIngredients : undefined
  );

  return {
    request,
    prompt,
    rawResponse,
    recipes: deps.store.record(sessionId, recipes),
  };
}
