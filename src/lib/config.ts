export interface AppConfig {
  port: number;
  geminiApiKey: string;
  geminiModel: string;
  aiTimeoutMs: number;
  aiTemperature: number;
  aiMaxAttempts: number;
  aiRetryBaseMs: number;
  sessionTtlMs: number;
  jwtSecret: string;
  verifyDietaryIngredients: boolean;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readPositiveNumber(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name, fallback);
  if (value <= 0) {
    throw new Error(`${name} must be greater than 0, got "${env[name]?.trim()}"`);
  }
  return value;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.toLowerCase().trim();
  if (!raw) return fallback;
  return raw !== "false" && raw !== "0" && raw !== "no";
}

function getApiKey(env: Env): string {
  const key = env.GEMINI_API_KEY ?? env.GOOGLE_AI_API_KEY;
  if (!key) {
    throw new Error("GEMINI_API_KEY or GOOGLE_AI_API_KEY required");
  }
  return key;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readNumber(env, "PORT", 3001),
    geminiApiKey: getApiKey(env),
    geminiModel: env.GEMINI_MODEL || "gemini-2.5-flash",
    aiTimeoutMs: readPositiveNumber(env, "AI_TIMEOUT_MS", 30_000),
    aiTemperature: readNumber(env, "AI_TEMPERATURE", 0.7),
    aiMaxAttempts: Math.max(1, Math.floor(readNumber(env, "AI_MAX_ATTEMPTS", 3))),
    aiRetryBaseMs: Math.max(0, readNumber(env, "AI_RETRY_BASE_MS", 1000)),
    sessionTtlMs: readPositiveNumber(env, "SESSION_TTL_MINUTES", 120) * 60 * 1000,
    jwtSecret: env.JWT_SECRET || "pantry-chef-dev-secret-change-me",
    verifyDietaryIngredients: readBoolean(env, "VERIFY_DIETARY_INGREDIENTS", true),
  };
}
