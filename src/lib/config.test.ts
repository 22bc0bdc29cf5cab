import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({ GEMINI_API_KEY: "test-key" })).toEqual({
      port: 3001,
      geminiApiKey: "test-key",
      geminiModel: "gemini-2.5-flash",
      aiTimeoutMs: 30_000,
      aiTemperature: 0.7,
      aiMaxAttempts: 3,
      aiRetryBaseMs: 1000,
      sessionTtlMs: 120 * 60 * 1000,
      jwtSecret: "pantry-chef-dev-secret-change-me",
      verifyDietaryIngredients: true,
    });
  });

  it("requires an API key", () => {
    expect(() => loadConfig({})).toThrow("GEMINI_API_KEY or GOOGLE_AI_API_KEY required");
    expect(loadConfig({ GOOGLE_AI_API_KEY: "other-key" }).geminiApiKey).toBe("other-key");
  });

  it("reads overrides", () => {
    const config = loadConfig({
      GEMINI_API_KEY: "test-key",
      AI_TIMEOUT_MS: "5000",
      AI_MAX_ATTEMPTS: "0",
      SESSION_TTL_MINUTES: "1",
      VERIFY_DIETARY_INGREDIENTS: "false",
    });
    expect(config.aiTimeoutMs).toBe(5000);
    expect(config.aiMaxAttempts).toBe(1);
    expect(config.sessionTtlMs).toBe(60_000);
    expect(config.verifyDietaryIngredients).toBe(false);
  });

  it("rejects non-numeric values", () => {
    expect(() => loadConfig({ GEMINI_API_KEY: "test-key", AI_TIMEOUT_MS: "soon" })).toThrow(
      'AI_TIMEOUT_MS must be a number, got "soon"'
    );
  });

  it("rejects a timeout or session lifetime that is not positive", () => {
    expect(() => loadConfig({ GEMINI_API_KEY: "test-key", AI_TIMEOUT_MS: "0" })).toThrow(
      'AI_TIMEOUT_MS must be greater than 0, got "0"'
    );
    expect(() => loadConfig({ GEMINI_API_KEY: "test-key", SESSION_TTL_MINUTES: "-5" })).toThrow(
      'SESSION_TTL_MINUTES must be greater than 0, got "-5"'
    );
  });
});
