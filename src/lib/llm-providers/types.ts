/**
 * Sends a fully built prompt to a model and returns its raw text reply.
 * Implementations reject with AiError.
 */
export interface RecipeGenerator {
  generate(prompt: string): Promise<string>;
}

export interface GeminiOptions {
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  maxAttempts: number;
  retryBaseMs: number;
}
