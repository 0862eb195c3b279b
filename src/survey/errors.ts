// src/survey/errors.ts
import type { ResponsePath } from "@/path";

export type SurveyDefinitionErrorType = "reserved_segment" | "invalid_override";

/**
 * A question tree or override set the core cannot work with. Programming error, not user input.
 */
export class SurveyDefinitionError extends Error {
  constructor(
    public readonly type: SurveyDefinitionErrorType,
    public readonly path: ResponsePath,
    message: string,
  ) {
    super(message);
    this.name = "SurveyDefinitionError";
  }
}
