import { GoogleGenerativeAI } from "@google/generative-ai";
import { AiError } from "../errors";
import type { GeminiOptions, RecipeGenerator } from "./types";

export function cleanJsonResponse(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith("```")) {
    const lines = cleaned.split("\n");
    cleaned = lines.slice(1).join("\n");
  }
  if (cleaned.endsWith("```")) {
    cleaned = cleaned.slice(0, -3).trim();
  }
  return cleaned;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isAbort(error: unknown): boolean {
  return error instanceof Error && (error.name.includes("Abort") || /aborted/i.test(error.message));
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new AiError("TIMEOUT", `No response from Gemini within ${timeoutMs}ms`)),
      timeoutMs
    );
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function createGeminiRecipeGenerator(options: GeminiOptions): RecipeGenerator {
  const genAI = new GoogleGenerativeAI(options.apiKey);
  const model = genAI.getGenerativeModel(
    {
      model: options.model,
      generationConfig: {
        responseMimeType: "application/json",
        temperature: options.temperature,
      },
    },
    { timeout: options.timeoutMs }
  );

  async function attempt(prompt: string): Promise<string> {
    let text: string;
    try {
      const result = await withTimeout(model.generateContent(prompt), options.timeoutMs);
      text = result.response.text();
    } catch (error) {
      if (error instanceof AiError) throw error;
      if (isAbort(error)) {
        throw new AiError("TIMEOUT", `Gemini request aborted: ${errorMessage(error)}`, { cause: error });
      }
      throw new AiError("SERVICE_FAILURE", `Gemini request failed: ${errorMessage(error)}`, { cause: error });
    }

    const cleaned = cleanJsonResponse(text);
    if (!cleaned) {
      throw new AiError("EMPTY_RESPONSE", "Empty response from Gemini");
    }
    return cleaned;
  }

  return {
    async generate(prompt: string): Promise<string> {
      const t0 = Date.now();
      for (let n = 0; ; n++) {
        try {
          const text = await attempt(prompt);
          console.log(`[gemini] reply of ${text.length} chars in ${Date.now() - t0}ms`);
          return text;
        } catch (error) {
          const retryable = error instanceof AiError && error.code === "SERVICE_FAILURE";
          if (!retryable || n + 1 >= options.maxAttempts) {
            console.error(`[gemini] giving up after ${n + 1} attempt(s):`, errorMessage(error));
            throw error;
          }
          const wait = options.retryBaseMs * 2 ** n;
          console.error(`[gemini] attempt ${n + 1} failed, retrying in ${wait}ms:`, errorMessage(error));
          await delay(wait);
        }
      }
    },
  };
}
