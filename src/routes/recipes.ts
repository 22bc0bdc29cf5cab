import { Router, type Response } from "express";
import { AiError, ValidationError } from "../lib/errors";
import { exportJson, exportText } from "../lib/export";
import type { RecipeOptionsInput } from "../lib/normalize";
import { generateForSession, type PipelineDeps } from "../lib/pipeline";
import { SessionNotFoundError } from "../lib/session-store";
import type { SessionRequest } from "../lib/session-types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toStringList(value: unknown): string[] | undefined {
  if (typeof value === "string") return value.split(",");
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}

function toOptionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function toOptionalNumber(value: unknown): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function readForm(body: unknown): { ingredients: string; options: RecipeOptionsInput } {
  const form: Record<string, unknown> = isRecord(body) ? body : {};
  const ingredients = Array.isArray(form.ingredients)
    ? form.ingredients.filter((item): item is string => typeof item === "string").join(",")
    : toOptionalString(form.ingredients) ?? "";

  return {
    ingredients,
    options: {
      dietaryRestrictions: toStringList(form.dietaryRestrictions),
      cuisine: toOptionalString(form.cuisine),
      difficulty: toOptionalString(form.difficulty),
      maxCookingMinutes: toOptionalNumber(form.maxCookingMinutes),
      notes: toOptionalString(form.notes),
    },
  };
}

function validationStatus(error: ValidationError): number {
  switch (error.code) {
    case "EMPTY_INGREDIENTS":
      return 400;
    case "UNKNOWN_RECIPE":
      return 404;
    default:
      return 422;
  }
}

function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof ValidationError) {
    res.status(validationStatus(error)).json({ error: error.message, code: error.code });
    return;
  }
  if (error instanceof AiError) {
    console.error(`[recipes] AI error ${error.code}:`, error.message);
    res
      .status(error.code === "TIMEOUT" ? 504 : 502)
      .json({ error: "The recipe service did not respond properly. Please try again.", code: error.code });
    return;
  }
  if (error instanceof SessionNotFoundError) {
    res.status(401).json({ error: "Session ended or expired" });
    return;
  }
  console.error(`[recipes] ${fallback}:`, error);
  res.status(500).json({ error: fallback });
}

function sessionOf(req: SessionRequest, res: Response): string | null {
  if (!req.sessionId) {
    res.status(401).json({ error: "Session required" });
    return null;
  }
  return req.sessionId;
}

export function createRecipeRouter(deps: PipelineDeps): Router {
  const router = Router();

  // POST /api/recipes/generate
  router.post("/generate", async (req: SessionRequest, res) => {
    const sessionId = sessionOf(req, res);
    if (!sessionId) return;

    try {
      const { ingredients, options } = readForm(req.body);
      const result = await generateForSession(deps, sessionId, ingredients, options);

      const body: Record<string, unknown> = {
        request: result.request,
        recipes: result.recipes,
      };
      if (req.query.debug === "true") {
        body.debug = { prompt: result.prompt, rawResponse: result.rawResponse };
      }
      res.json(body);
    } catch (error) {
      sendError(res, error, "Failed to generate recipes");
    }
  });

  // GET /api/recipes
  router.get("/", (req: SessionRequest, res) => {
    const sessionId = sessionOf(req, res);
    if (!sessionId) return;
    res.json({ recipes: deps.store.get(sessionId) });
  });

  // PUT /api/recipes/:recipeId/rating
  router.put("/:recipeId/rating", (req: SessionRequest, res) => {
    const sessionId = sessionOf(req, res);
    if (!sessionId) return;

    const stars = toOptionalNumber(req.body?.stars);
    try {
      const recipe = deps.store.rate(sessionId, req.params.recipeId, stars ?? Number.NaN);
      res.json({ recipe });
    } catch (error) {
      sendError(res, error, "Failed to rate recipe");
    }
  });

  // DELETE /api/recipes/ratings
  router.delete("/ratings", (req: SessionRequest, res) => {
    const sessionId = sessionOf(req, res);
    if (!sessionId) return;

    try {
      deps.store.clearRatings(sessionId);
      res.json({ recipes: deps.store.get(sessionId) });
    } catch (error) {
      sendError(res, error, "Failed to clear ratings");
    }
  });

  // GET /api/recipes/stats
  router.get("/stats", (req: SessionRequest, res) => {
    const sessionId = sessionOf(req, res);
    if (!sessionId) return;
    res.json(deps.store.stats(sessionId));
  });

  // GET /api/recipes/export.json
  router.get("/export.json", (req: SessionRequest, res) => {
    const sessionId = sessionOf(req, res);
    if (!sessionId) return;
    res.attachment("recipes.json").send(exportJson(deps.store.get(sessionId)));
  });

  // GET /api/recipes/export.txt
  router.get("/export.txt", (req: SessionRequest, res) => {
    const sessionId = sessionOf(req, res);
    if (!sessionId) return;
    res.attachment("recipes.txt").send(exportText(deps.store.get(sessionId)));
  });

  return router;
}
