// src/validation/types.ts
import type { PathMap, ResponsePath } from "@/path";
import type { ReadonlyResponses } from "@/responses";

export type ValidationResult = { valid: true } | { valid: false; message: string };

/**
 * Judges the value stored at `path`. The full store is passed so a validator may
 * compare against sibling fields, but it only reports on `path`.
 */
export type FieldValidator = (path: ResponsePath, responses: ReadonlyResponses) => ValidationResult;

/** Whole-survey check reporting any number of path-keyed failures at once */
export type CompositeValidator = (responses: ReadonlyResponses) => PathMap<string>;

export type ValidationErrors = PathMap<string>;
