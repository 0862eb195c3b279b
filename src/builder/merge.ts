// src/builder/merge.ts
// Overlays suggestions and assumptions onto a fresh question tree before collection

import { PathMap, ResponsePath } from "@/path";
import { describeValue, ResponseError, Responses, type ResponseValue } from "@/responses";
import { SurveyDefinitionError } from "@/survey/errors";
import { allOf, assumed, question, suggested } from "@/survey/question";
import { answerPath, cloneDefinition, variantQuestions } from "@/survey/traverse";
import type { Question, SurveyDefinition } from "@/survey/types";
import { checkAnswer, expectedValueType } from "@/validation/checks";

export interface Overrides {
  suggestions: PathMap<ResponseValue>;
  assumptions: PathMap<ResponseValue>;
}

export interface MergeResult {
  /** Pruned copy of the input tree; assumed questions are gone */
  definition: SurveyDefinition;
  /** Seeded with every assumed value */
  responses: Responses;
  suggested: ResponsePath[];
  assumed: ResponsePath[];
  /** Override keys no question answered at, e.g. paths under a variant not yet chosen */
  unmatched: ResponsePath[];
}

interface MergeContext extends Overrides {
  responses: Responses;
  matched: PathMap<true>;
  suggested: ResponsePath[];
  assumed: ResponsePath[];
}

function ensureFits(q: Question, target: ResponsePath, value: ResponseValue): void {
  const expected = expectedValueType(q.kind);
  if (expected !== undefined && expected !== value.type) {
    throw ResponseError.mismatch(target, expected, value.type);
  }
  const result = checkAnswer(q.kind, value);
  if (!result.valid) {
    throw new SurveyDefinitionError(
      "invalid_override",
      target,
      `Override ${describeValue(value)} does not fit ${target.display()}: ${result.message}`,
    );
  }
}

/**
 * What replaces an assumed question. Scalars disappear; an assumed selection is replaced
 * by a group holding the chosen variants' data questions in their usual namespace.
 */
function replaceAssumed(q: Question, prefix: ResponsePath, value: ResponseValue, ctx: MergeContext): Question | undefined {
  const kind = q.kind;
  let data: Question[] = [];

  if (kind.type === "one_of" && value.type === "chosen_variant") {
    const chosen = kind.variants[value.index];
    data = chosen ? variantQuestions(chosen) : [];
  } else if (kind.type === "any_of" && value.type === "chosen_variants") {
    for (const index of value.indices) {
      const chosen = kind.variants[index];
      if (!chosen) continue;
      const fields = variantQuestions(chosen);
      if (fields.length > 0) data.push(question(String(index), chosen.name, allOf(fields)));
    }
  }

  if (data.length === 0) return undefined;
  return mergeQuestion(question(q.path, q.ask, allOf(data)), prefix, ctx);
}

function mergeQuestion(q: Question, prefix: ResponsePath, ctx: MergeContext): Question | undefined {
  const path = prefix.concat(q.path);
  const kind = q.kind;

  if (kind.type === "all_of") {
    const hadChildren = kind.questions.length > 0;
    kind.questions = mergeQuestions(kind.questions, path, ctx);
    return hadChildren && kind.questions.length === 0 ? undefined : q;
  }

  const target = answerPath(q, path);
  if (!target) return q;
  if (ctx.suggestions.has(target) || ctx.assumptions.has(target)) ctx.matched.set(target, true);

  const assumption = ctx.assumptions.get(target);
  if (assumption) {
    ensureFits(q, target, assumption);
    q.default = assumed(assumption);
    ctx.responses.insert(target, assumption);
    ctx.assumed.push(target);
    return replaceAssumed(q, prefix, assumption, ctx);
  }

  const suggestion = ctx.suggestions.get(target);
  if (suggestion) {
    ensureFits(q, target, suggestion);
    q.default = suggested(suggestion);
    ctx.suggested.push(target);
  }
  return q;
}

function mergeQuestions(questions: Question[], prefix: ResponsePath, ctx: MergeContext): Question[] {
  const kept: Question[] = [];
  for (const q of questions) {
    const merged = mergeQuestion(q, prefix, ctx);
    if (merged) kept.push(merged);
  }
  return kept;
}

/**
 * Applies overrides to a deep copy of `def`. An assumption wins over a suggestion for the
 * same path. The input tree is left untouched, so the same inputs always give the same output.
 */
export function applyOverrides(def: SurveyDefinition, overrides: Overrides): MergeResult {
  const copy = cloneDefinition(def);
  const ctx: MergeContext = {
    ...overrides,
    responses: new Responses(),
    matched: new PathMap<true>(),
    suggested: [],
    assumed: [],
  };

  copy.questions = mergeQuestions(copy.questions, ResponsePath.empty(), ctx);

  const unmatched = new PathMap<true>();
  for (const path of [...overrides.suggestions.keys(), ...overrides.assumptions.keys()]) {
    if (!ctx.matched.has(path)) unmatched.set(path, true);
  }

  return {
    definition: copy,
    responses: ctx.responses,
    suggested: ctx.suggested,
    assumed: ctx.assumed,
    unmatched: [...unmatched.keys()],
  };
}
