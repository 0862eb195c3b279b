// src/validation/dispatch.ts
import { PathMap, type ResponsePath } from "@/path";
import type { ReadonlyResponses } from "@/responses";
import { findQuestion, selectionsFrom, walkQuestions } from "@/survey/traverse";
import type { SurveyDefinition } from "@/survey/types";

import { checkAnswer, invalid, VALID } from "./checks";
import type { CompositeValidator, FieldValidator, ValidationErrors } from "./types";

/**
 * Field validator for a whole tree: the built-in kind check for the question answering
 * at `path` under the selections stored so far, then the schema's own validator.
 * Every validator gets a copy of the store.
 */
export function createFieldValidator(def: SurveyDefinition, schemaValidator?: FieldValidator): FieldValidator {
  return (path: ResponsePath, responses: ReadonlyResponses) => {
    const value = responses.get(path);
    if (!value) return invalid(`No answer given for ${path.display()}`);

    const q = findQuestion(def.questions, path, selectionsFrom(responses));
    if (q) {
      const result = checkAnswer(q.kind, value);
      if (!result.valid) return result;
    }

    return schemaValidator ? schemaValidator(path, responses.clone()) : VALID;
  };
}

export interface ValidateSurveyInput {
  definition: SurveyDefinition;
  responses: ReadonlyResponses;
  fieldValidator: FieldValidator;
  compositeValidators?: CompositeValidator[];
}

/**
 * One validation pass. Field validators run first, for every answered question reachable
 * under the stored selections in traversal order; composite validators follow in order.
 * All results share one map, so a later error for a path replaces an earlier one.
 */
export function validateSurvey({
  definition,
  responses,
  fieldValidator,
  compositeValidators = [],
}: ValidateSurveyInput): ValidationErrors {
  const errors = new PathMap<string>();

  walkQuestions(
    definition.questions,
    ({ answerPath }) => {
      if (!answerPath || !responses.has(answerPath)) return;
      const result = fieldValidator(answerPath, responses.clone());
      if (!result.valid) errors.set(answerPath, result.message);
    },
    selectionsFrom(responses),
  );

  for (const composite of compositeValidators) {
    for (const [path, message] of composite(responses.clone())) {
      errors.set(path, message);
    }
  }

  return errors;
}
