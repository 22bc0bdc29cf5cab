import "dotenv/config";
import { createApp } from "./app";
import { loadConfig } from "./lib/config";
import { createGeminiRecipeGenerator } from "./lib/llm-providers/gemini";
import { SessionStore } from "./lib/session-store";

const SWEEP_INTERVAL_MS = 5 * 60 * 1000;

const config = loadConfig();
const store = new SessionStore({ ttlMs: config.sessionTtlMs });

const app = createApp({
  generator: createGeminiRecipeGenerator({
    apiKey: config.geminiApiKey,
    model: config.geminiModel,
    temperature: config.aiTemperature,
    timeoutMs: config.aiTimeoutMs,
    maxAttempts: config.aiMaxAttempts,
    retryBaseMs: config.aiRetryBaseMs,
  }),
  store,
  jwtSecret: config.jwtSecret,
  verifyDietaryIngredients: config.verifyDietaryIngredients,
});

setInterval(() => {
  const removed = store.sweepExpired();
  if (removed > 0) {
    console.log(`[session] expired ${removed} idle session(s)`);
  }
}, SWEEP_INTERVAL_MS).unref();

app.listen(config.port, () => {
  console.log(`Pantry Chef server running on http://localhost:${config.port}`);
});
