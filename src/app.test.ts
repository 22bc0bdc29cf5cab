import type { Server } from "node:http";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "./app";
import { AiError } from "./lib/errors";
import { SessionStore } from "./lib/session-store";
import type { RatedRecipe, Recipe } from "./lib/types";

const generate = vi.fn<(prompt: string) => Promise<string>>();
const store = new SessionStore({ ttlMs: 60_000 });
const app = createApp({
  generator: { generate },
  store,
  jwtSecret: "test-secret",
  verifyDietaryIngredients: true,
});

let server: Server;
let baseUrl = "";

const pancakes: Recipe = {
  title: "Pancakes",
  ingredients: ["200 g flour", "300 ml water", "1 pinch salt"],
  instructions: ["Whisk into a batter.", "Fry in a hot pan."],
  nutrition: { calories_per_serving: 210 },
  dietaryTags: ["Vegan"],
};

const dumplings: Recipe = {
  title: "Dumplings",
  ingredients: ["150 g flour", "80 ml water", "1 tsp salt"],
  instructions: ["Knead.", "Boil for 8 minutes."],
  nutrition: { calories_per_serving: 170 },
  dietaryTags: ["Vegan"],
};

interface CallOptions {
  method?: string;
  token?: string;
  body?: unknown;
}

async function call(path: string, { method = "GET", token, body }: CallOptions = {}) {
  const headers: Record<string, string> = {};
  if (token) headers.Authorization = `Bearer ${token}`;
  if (body !== undefined) headers["Content-Type"] = "application/json";
  return fetch(`${baseUrl}${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

async function json<T>(res: Response): Promise<T> {
  return (await res.json()) as T;
}

async function startSession(): Promise<string> {
  const res = await call("/api/session", { method: "POST" });
  expect(res.status).toBe(201);
  return (await json<{ token: string }>(res)).token;
}

beforeAll(async () => {
  await new Promise<void>((resolve) => {
    server = app.listen(0, resolve);
  });
  const address = server.address();
  if (address && typeof address === "object") {
    baseUrl = `http://127.0.0.1:${address.port}`;
  }
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
});

beforeEach(() => {
  generate.mockReset();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("public routes", () => {
  it("reports health", async () => {
    const res = await call("/health");
    expect(res.status).toBe(200);
    expect(await json(res)).toEqual({ status: "ok" });
  });

  it("lists form options", async () => {
    const body = await json<{ dietaryRestrictions: string[]; cuisines: string[]; difficulties: string[] }>(
      await call("/api/options")
    );
    expect(body.dietaryRestrictions).toHaveLength(10);
    expect(body.cuisines[0]).toBe("Any");
    expect(body.difficulties).toEqual(["Any", "Easy", "Intermediate", "Advanced"]);
  });
});

describe("session guard", () => {
  it("rejects requests without a token", async () => {
    expect((await call("/api/recipes")).status).toBe(401);
  });

  it("rejects a malformed token", async () => {
    const res = await call("/api/recipes", { token: "not-a-real-token" });
    expect(res.status).toBe(401);
  });
});

describe("recipe flow", () => {
  it("generates, rates, summarizes, exports and ends a session", async () => {
    const token = await startSession();
    generate.mockResolvedValue(JSON.stringify([pancakes, dumplings]));

    const generated = await call("/api/recipes/generate", {
      method: "POST",
      token,
      body: { ingredients: "flour, water, salt", dietaryRestrictions: ["vegan"] },
    });
    expect(generated.status).toBe(200);
    const { recipes } = await json<{ recipes: RatedRecipe[] }>(generated);
    expect(recipes.map((r) => [r.recipe.title, r.rating])).toEqual([
      ["Pancakes", 0],
      ["Dumplings", 0],
    ]);

    const listed = await json<{ recipes: RatedRecipe[] }>(await call("/api/recipes", { token }));
    expect(listed.recipes.map((r) => r.id)).toEqual(recipes.map((r) => r.id));

    const rated = await call(`/api/recipes/${recipes[0].id}/rating`, {
      method: "PUT",
      token,
      body: { stars: 4 },
    });
    expect(rated.status).toBe(200);
    expect((await json<{ recipe: RatedRecipe }>(rated)).recipe.rating).toBe(4);

    const tooMany = await call(`/api/recipes/${recipes[0].id}/rating`, {
      method: "PUT",
      token,
      body: { stars: 6 },
    });
    expect(tooMany.status).toBe(422);
    expect(await json(tooMany)).toMatchObject({ code: "OUT_OF_RANGE" });

    const unknown = await call("/api/recipes/nope/rating", { method: "PUT", token, body: { stars: 3 } });
    expect(unknown.status).toBe(404);

    const stats = await json(await call("/api/recipes/stats", { token }));
    expect(stats).toEqual({
      average: 4,
      ratedCount: 1,
      distribution: { 1: 0, 2: 0, 3: 0, 4: 1, 5: 0 },
    });

    const text = await call("/api/recipes/export.txt", { token });
    expect(text.headers.get("content-type")).toContain("text/plain");
    expect(text.headers.get("content-disposition")).toBe('attachment; filename="recipes.txt"');
    expect((await text.text()).split("\n")[0]).toBe("Pancakes");

    const exported = await call("/api/recipes/export.json", { token });
    expect(exported.headers.get("content-disposition")).toBe('attachment; filename="recipes.json"');
    expect(await json(exported)).toEqual([pancakes, dumplings]);

    const cleared = await json<{ recipes: RatedRecipe[] }>(
      await call("/api/recipes/ratings", { method: "DELETE", token })
    );
    expect(cleared.recipes.map((r) => r.rating)).toEqual([0, 0]);

    expect((await call("/api/session", { method: "DELETE", token })).status).toBe(204);
    expect((await call("/api/recipes", { token })).status).toBe(401);
  });

  it("includes the prompt and raw reply in debug mode", async () => {
    const token = await startSession();
    const raw = JSON.stringify([pancakes, dumplings]);
    generate.mockResolvedValue(raw);

    const res = await call("/api/recipes/generate?debug=true", {
      method: "POST",
      token,
      body: { ingredients: "flour, water, salt" },
    });
    const body = await json<{ debug: { prompt: string; rawResponse: string } }>(res);
    expect(body.debug.prompt.split("\n")).toContain("Ingredients: flour, water, salt");
    expect(body.debug.rawResponse).toBe(raw);
  });
});

describe("generation errors", () => {
  it("returns 400 for empty ingredients", async () => {
    const token = await startSession();
    const res = await call("/api/recipes/generate", { method: "POST", token, body: { ingredients: " , " } });
    expect(res.status).toBe(400);
    expect(await json(res)).toMatchObject({ code: "EMPTY_INGREDIENTS" });
    expect(generate).not.toHaveBeenCalled();
  });

  it("returns 422 when the reply is not JSON", async () => {
    const token = await startSession();
    generate.mockResolvedValue("not json");
    const res = await call("/api/recipes/generate", { method: "POST", token, body: { ingredients: "rice" } });
    expect(res.status).toBe(422);
    expect(await json(res)).toMatchObject({ code: "MALFORMED_JSON" });
  });

  it("returns 504 on an AI timeout and 502 on other AI failures", async () => {
    const token = await startSession();

    generate.mockRejectedValueOnce(new AiError("TIMEOUT", "No response from Gemini within 30000ms"));
    const timedOut = await call("/api/recipes/generate", { method: "POST", token, body: { ingredients: "rice" } });
    expect(timedOut.status).toBe(504);
    expect(await json(timedOut)).toMatchObject({ code: "TIMEOUT" });

    generate.mockRejectedValueOnce(new AiError("SERVICE_FAILURE", "Gemini request failed"));
    const failed = await call("/api/recipes/generate", { method: "POST", token, body: { ingredients: "rice" } });
    expect(failed.status).toBe(502);
    expect(await json(failed)).toMatchObject({ code: "SERVICE_FAILURE" });
  });
});
