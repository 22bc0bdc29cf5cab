import express from "express";
import cors from "cors";
import type { RecipeGenerator } from "./lib/llm-providers/types";
import type { SessionStore } from "./lib/session-store";
import { createSessionAuth } from "./middleware/session";
import optionRoutes from "./routes/options";
import { createRecipeRouter } from "./routes/recipes";
import { createSessionRouter } from "./routes/session";

export interface AppDeps {
  generator: RecipeGenerator;
  store: SessionStore;
  jwtSecret: string;
  verifyDietaryIngredients: boolean;
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const auth = createSessionAuth(deps.store, deps.jwtSecret);

  app.use(cors());
  app.use(express.json());

  // Public routes
  app.use("/api/options", optionRoutes);
  app.use("/api/session", createSessionRouter(deps.store, auth));

  // Session-scoped routes
  app.use(
    "/api/recipes",
    auth.requireSession,
    createRecipeRouter({
      generator: deps.generator,
      store: deps.store,
      verifyDietaryIngredients: deps.verifyDietaryIngredients,
    })
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  return app;
}
