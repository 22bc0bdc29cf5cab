export type ValidationErrorCode =
  | "EMPTY_INGREDIENTS"
  | "MALFORMED_JSON"
  | "WRONG_COUNT"
  | "INSUFFICIENT_VALID_RECIPES"
  | "OUT_OF_RANGE"
  | "UNKNOWN_RECIPE";

export type AiErrorCode = "TIMEOUT" | "SERVICE_FAILURE" | "EMPTY_RESPONSE";

/** A user input or model reply that failed a check. Shown inline; never retried. */
export class ValidationError extends Error {
  readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
  }
}

/** The AI service could not produce a usable reply. The user may resubmit. */
export class AiError extends Error {
  readonly code: AiErrorCode;

  constructor(code: AiErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AiError";
    this.code = code;
  }
}
