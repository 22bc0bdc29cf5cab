export const DIETARY_TAGS = [
  "Vegetarian",
  "Vegan",
  "Gluten-Free",
  "Dairy-Free",
  "Low-Carb",
  "Keto",
  "Paleo",
  "Nut-Free",
  "Diabetic-Friendly",
  "Heart-Healthy",
] as const;

export type DietaryTag = (typeof DIETARY_TAGS)[number];

export const CUISINES = [
  "Italian",
  "Asian",
  "Mexican",
  "Mediterranean",
  "Indian",
  "American",
  "French",
  "Thai",
  "Japanese",
] as const;

export type Cuisine = (typeof CUISINES)[number];

export const DIFFICULTIES = ["Any", "Easy", "Intermediate", "Advanced"] as const;

export type Difficulty = (typeof DIFFICULTIES)[number];

export interface RecipeRequest {
  ingredients: string[];
  /** Canonical enum order, no duplicates. */
  dietaryRestrictions: DietaryTag[];
  cuisine?: Cuisine;
  difficulty: Difficulty;
  maxCookingMinutes?: number;
  notes?: string;
}

export type NutritionValue = number | string;

export interface Recipe {
  title: string;
  /** Each entry carries its quantity, e.g. "200 g flour". */
  ingredients: string[];
  instructions: string[];
  nutrition: Record<string, NutritionValue>;
  dietaryTags: string[];
  cookingTimeMinutes?: number;
  difficulty?: string;
  servings?: number;
  tips?: string[];
  allergenWarnings?: string[];
}

export interface RatedRecipe {
  id: string;
  recipe: Recipe;
  rating: number;
  ratedAt: string | null;
}

export interface RatingStats {
  average: number;
  ratedCount: number;
  /** Keyed by star count 1-5. */
  distribution: Record<1 | 2 | 3 | 4 | 5, number>;
}
