// src/responses/errors.ts
import type { ResponsePath } from "@/path";

import type { ResponseValueType } from "./types";

export type ResponseErrorType = "missing_path" | "type_mismatch";

/**
 * Raised when a store accessor is used against an absent path or the wrong value tag.
 * Indicates a bug in reconstruction or in how the store was filled, not a user error.
 */
export class ResponseError extends Error {
  constructor(
    public readonly type: ResponseErrorType,
    public readonly path: ResponsePath,
    message: string,
    public readonly expected?: ResponseValueType,
    public readonly actual?: ResponseValueType,
  ) {
    super(message);
    this.name = "ResponseError";
  }

  static missing(path: ResponsePath): ResponseError {
    return new ResponseError("missing_path", path, `Missing response for path: ${path.display()}`);
  }

  static mismatch(path: ResponsePath, expected: ResponseValueType, actual: ResponseValueType): ResponseError {
    return new ResponseError(
      "type_mismatch",
      path,
      `Type mismatch at path '${path.display()}': expected ${expected}, got ${actual}`,
      expected,
      actual,
    );
  }
}
