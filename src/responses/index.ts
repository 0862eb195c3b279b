// src/responses/index.ts
export { ResponseError, type ResponseErrorType } from "./errors";
export { isResponseValue, parseResponseValue, ResponseValueSchema } from "./schema";
export { isValueOfType, type ReadonlyResponses, Responses } from "./store";
export type { ResponseValue, ResponseValueOf, ResponseValueType } from "./types";
export {
  bool,
  chosenVariant,
  chosenVariants,
  cloneValue,
  describeValue,
  float,
  floatList,
  int,
  intList,
  text,
  textList,
  valuesEqual,
} from "./value";
