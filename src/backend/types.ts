// src/backend/types.ts
import type { ReadonlyResponses, Responses } from "@/responses";
import type { SurveyDefinition } from "@/survey/types";
import type { FieldValidator, ValidationErrors } from "@/validation/types";

/** Runs the composite pass over everything collected so far */
export type SurveyValidator = (responses: ReadonlyResponses) => ValidationErrors;

/**
 * A collection surface: wizard, form, scripted test double.
 *
 * It walks the (possibly pruned) tree, retries rejected answers itself and only resolves
 * once every remaining question is answered. It rejects with a SurveyError of type
 * `cancelled` or `backend`; validation failures never leave it.
 */
export interface SurveyBackend {
  collect(definition: SurveyDefinition, validate: FieldValidator, validateAll: SurveyValidator): Promise<Responses>;
}
