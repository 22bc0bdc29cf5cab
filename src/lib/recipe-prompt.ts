import type { DietaryTag, RecipeRequest } from "./types";

export const RECIPE_SCHEMA_NAME = "RecipeSuggestionList";

export const DIETARY_RULES: Record<DietaryTag, string> = {
  Vegetarian: "No meat, fish, or poultry",
  Vegan: "No animal products (meat, fish, dairy, eggs, honey)",
  "Gluten-Free": "No wheat, barley, rye, or other gluten-containing ingredients",
  "Dairy-Free": "No milk, cheese, butter, cream, yogurt, or other dairy products",
  "Low-Carb": "Maximum 20g carbs per serving",
  Keto: "Maximum 10g net carbs per serving, high fat content",
  Paleo: "No grains, legumes, dairy, or processed foods",
  "Nut-Free": "No tree nuts or peanuts",
  "Diabetic-Friendly": "Low sugar, controlled carbs",
  "Heart-Healthy": "Low sodium, low saturated fat",
};

export const RECIPE_PROMPT_PREFIX = `You are an expert chef and nutritionist. Suggest recipes that use the ingredients listed at the end of this message.

Return ONLY valid JSON: an array of 2 to 3 recipe objects that strictly follows the ${RECIPE_SCHEMA_NAME} schema below.

${RECIPE_SCHEMA_NAME}:
[
  {
    "title": "Name of the recipe",
    "ingredients": ["200 g ingredient name", "1 tbsp ingredient name"],
    "instructions": ["Step 1 text...", "Step 2 text..."],
    "nutrition": {
      "calories_per_serving": 350,
      "protein_grams": 25,
      "carbs_grams": 45,
      "fat_grams": 12,
      "fiber_grams": 8,
      "sugar_grams": 5
    },
    "dietaryTags": ["Vegetarian"],
    "cookingTimeMinutes": 30,
    "difficulty": "Easy",
    "servings": 4,
    "tips": ["Helpful tip"],
    "allergenWarnings": ["Contains dairy"]
  }
]

Rules for recipes:
- Return at least 2 and at most 3 recipes, each different from the others
- Use primarily the ingredients provided; suggest realistic quantities
- Extra ingredients are allowed only when they comply with every dietary restriction

Rules for ingredients:
- Each entry is one string with the quantity first, e.g. "2 cloves garlic"

Rules for instructions:
- Chronological steps, one clear sentence each

Rules for nutrition:
- Estimates per serving, numbers only

Rules for dietaryTags:
- List every dietary restriction the recipe satisfies, spelled exactly as given below
- Never list a restriction the recipe does not satisfy

Rules for difficulty:
- One of: Easy, Intermediate, Advanced

Return ONLY valid JSON. No markdown, explanations, or extra text.
`;

function formatRestrictions(tags: DietaryTag[]): string[] {
  if (tags.length === 0) {
    return ["Dietary restrictions: none"];
  }
  return [
    "Dietary restrictions (every recipe must satisfy ALL of these and list each in dietaryTags):",
    ...tags.map((tag) => `- ${tag}: ${DIETARY_RULES[tag]}`),
  ];
}

export function buildRecipePrompt(request: RecipeRequest): string {
  const lines = [
    RECIPE_PROMPT_PREFIX,
    `Ingredients: ${request.ingredients.join(", ")}`,
    ...formatRestrictions(request.dietaryRestrictions),
    `Cuisine: ${request.cuisine ?? "any"}`,
    `Difficulty: ${request.difficulty === "Any" ? "any" : request.difficulty}`,
    request.maxCookingMinutes
      ? `Maximum cooking time: ${request.maxCookingMinutes} minutes`
      : "Maximum cooking time: no limit",
  ];

  if (request.notes) {
    lines.push(`Additional notes: ${request.notes}`);
  }

  return lines.join("\n");
}
