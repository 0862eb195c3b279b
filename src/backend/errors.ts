// src/backend/errors.ts

/**
 * Error types that end a survey run
 */
export type SurveyErrorType = "cancelled" | "backend";

export class SurveyError extends Error {
  constructor(
    public readonly type: SurveyErrorType,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "SurveyError";
  }

  static cancelled(message = "Survey cancelled by user"): SurveyError {
    return new SurveyError("cancelled", message);
  }

  static backend(cause: unknown): SurveyError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new SurveyError("backend", `Backend error: ${detail}`, cause);
  }

  isCancelled(): boolean {
    return this.type === "cancelled";
  }
}
