// src/backend/index.ts
export { SurveyError, type SurveyErrorType } from "./errors";
export { type RejectedAnswer, TestBackend } from "./test-backend";
export type { SurveyBackend, SurveyValidator } from "./types";
