import dietaryRules from "../data/dietary-rules.json";
import type { DietaryTag, Recipe, RecipeRequest } from "./types";

interface KeywordRule {
  /** Qualifiers such as "vegan" that clear the forbidden word they directly precede. */
  markers: string[];
  /** Phrases removed from a line before forbidden words are matched. */
  exempt: string[];
  forbidden: string[];
}

export interface DietaryViolation {
  tag: DietaryTag;
  ingredient: string;
  keyword: string;
}

const RULES: Partial<Record<DietaryTag, KeywordRule>> = dietaryRules;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function alternation(words: string[]): string {
  return [...words]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");
}

const forbiddenPatterns = new Map<string, RegExp>();

function forbiddenPattern(keyword: string): RegExp {
  let pattern = forbiddenPatterns.get(keyword);
  if (!pattern) {
    pattern = new RegExp(`\\b${escapeRegExp(keyword)}\\b`);
    forbiddenPatterns.set(keyword, pattern);
  }
  return pattern;
}

// "vegan butter", "dairy-free cheddar cheese"
const qualifiedPatterns = new Map<KeywordRule, RegExp>();

function qualifiedPattern(rule: KeywordRule): RegExp {
  let pattern = qualifiedPatterns.get(rule);
  if (!pattern) {
    const forbidden = alternation(rule.forbidden);
    pattern = new RegExp(`\\b(?:${alternation(rule.markers)})(?:\\s+(?:${forbidden}))+\\b`, "g");
    qualifiedPatterns.set(rule, pattern);
  }
  return pattern;
}

function matchForbidden(ingredient: string, rule: KeywordRule): string | null {
  let line = ingredient.toLowerCase();
  for (const phrase of rule.exempt) {
    line = line.split(phrase).join(" ");
  }
  if (rule.markers.length > 0) {
    line = line.replace(qualifiedPattern(rule), " ");
  }
  // A marker elsewhere on the line qualifies nothing
  for (const marker of rule.markers) {
    line = line.split(marker).join(" ");
  }
  return rule.forbidden.find((keyword) => forbiddenPattern(keyword).test(line)) ?? null;
}

/** Tags with a keyword table; the rest (Keto, Low-Carb, ...) depend on amounts and are not checked. */
export function verifiableTags(): DietaryTag[] {
  return Object.keys(RULES).filter((tag): tag is DietaryTag => tag in RULES);
}

export function findViolations(recipe: Recipe, tags: DietaryTag[]): DietaryViolation[] {
  const violations: DietaryViolation[] = [];
  for (const tag of tags) {
    const rule = RULES[tag];
    if (!rule) continue;
    for (const ingredient of recipe.ingredients) {
      const keyword = matchForbidden(ingredient, rule);
      if (keyword) violations.push({ tag, ingredient, keyword });
    }
  }
  return violations;
}

export function verifyIngredients(recipe: Recipe, request: RecipeRequest): boolean {
  const violations = findViolations(recipe, request.dietaryRestrictions);
  if (violations.length > 0) {
    const first = violations[0];
    console.log(
      `[dietary] "${recipe.title}" claims ${first.tag} but lists "${first.ingredient}" (${first.keyword})`
    );
  }
  return violations.length === 0;
}
