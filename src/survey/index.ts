// src/survey/index.ts
export { SurveyDefinitionError, type SurveyDefinitionErrorType } from "./errors";
export {
  allOf,
  anyOf,
  assumed,
  confirm,
  definition,
  float,
  input,
  int,
  isAssumed,
  list,
  masked,
  multiline,
  NO_DEFAULT,
  none,
  oneOf,
  question,
  suggested,
  unitVariant,
  variant,
} from "./question";
export {
  positionalPath,
  selectedVariant,
  selectedVariantPath,
  selectedVariants,
  selectedVariantsPath,
  variantDataPath,
} from "./reconstruct";
export {
  ALL_VARIANTS,
  answerPath,
  cloneDefinition,
  cloneQuestion,
  findQuestion,
  findReservedSegmentCollisions,
  indexQuestions,
  NO_SELECTION,
  type ReservedSegmentCollision,
  type SelectionResolver,
  selectionsFrom,
  variantQuestions,
  type VisitedQuestion,
  walkQuestions,
} from "./traverse";
export type {
  AllOfKind,
  AnyOfKind,
  ConfirmKind,
  DefaultValue,
  FloatKind,
  InputKind,
  IntKind,
  LeafKind,
  ListElementKind,
  ListKind,
  MaskedKind,
  MultilineKind,
  OneOfKind,
  Question,
  QuestionKind,
  QuestionKindType,
  Survey,
  SurveyDefinition,
  Variant,
} from "./types";
