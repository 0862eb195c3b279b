// src/builder/index.ts
export { SurveyBuilder, type SurveyBuilderOptions } from "./builder";
export { applyOverrides, type MergeResult, type Overrides } from "./merge";
