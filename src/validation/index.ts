// src/validation/index.ts
export { checkAnswer, expectedValueType, invalid, VALID } from "./checks";
export { createFieldValidator, type ValidateSurveyInput, validateSurvey } from "./dispatch";
export type { CompositeValidator, FieldValidator, ValidationErrors, ValidationResult } from "./types";
