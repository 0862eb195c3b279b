// src/index.ts
// Public entry point

export * from "./backend";
export * from "./builder";
export * from "./config";
export * from "./constants";
export { createLogger, type Logger, type LoggerOptions } from "./log";
export * from "./path";
export {
  isResponseValue,
  isValueOfType,
  parseResponseValue,
  type ReadonlyResponses,
  ResponseError,
  type ResponseErrorType,
  Responses,
  type ResponseValue,
  type ResponseValueOf,
  ResponseValueSchema,
  type ResponseValueType,
} from "./responses";
/** Value constructors: `values.text("Alice")`, `values.chosenVariant(1)` */
export * as values from "./responses/value";
export {
  findReservedSegmentCollisions,
  indexQuestions,
  positionalPath,
  selectedVariant,
  selectedVariantPath,
  selectedVariants,
  selectedVariantsPath,
  SurveyDefinitionError,
  type SurveyDefinitionErrorType,
  variantDataPath,
  variantQuestions,
  walkQuestions,
} from "./survey";
export type * from "./survey/types";
/** Question constructors: `kinds.question("age", "How old are you?", kinds.int({ min: 0 }))` */
export * as kinds from "./survey/question";
export * from "./validation";
