import { Router } from "express";
import { verifiableTags } from "../lib/dietary-verifier";
import { MAX_RECIPES, MIN_RECIPES } from "../lib/recipe-validator";
import { MAX_STARS } from "../lib/session-store";
import { CUISINES, DIETARY_TAGS, DIFFICULTIES } from "../lib/types";

const router = Router();

// GET /api/options
router.get("/", (_req, res) => {
  res.json({
    dietaryRestrictions: DIETARY_TAGS,
    ingredientCheckedRestrictions: verifiableTags(),
    cuisines: ["Any", ...CUISINES],
    difficulties: DIFFICULTIES,
    recipeCount: { min: MIN_RECIPES, max: MAX_RECIPES },
    maxStars: MAX_STARS,
  });
});

export default router;
