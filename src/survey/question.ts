// src/survey/question.ts
// Constructors for building question trees bottom-up

import { ResponsePath } from "@/path";
import type { ResponseValue } from "@/responses";

import type {
  AllOfKind,
  AnyOfKind,
  ConfirmKind,
  DefaultValue,
  FloatKind,
  InputKind,
  IntKind,
  ListElementKind,
  ListKind,
  MaskedKind,
  MultilineKind,
  OneOfKind,
  Question,
  QuestionKind,
  SurveyDefinition,
  Variant,
} from "./types";

export const NO_DEFAULT: DefaultValue = { type: "none" };

export function question(path: string | ResponsePath, ask: string, kind: QuestionKind): Question {
  return {
    path: typeof path === "string" ? ResponsePath.root(path) : path,
    ask,
    kind,
    default: NO_DEFAULT,
  };
}

export function definition(
  questions: Question[],
  options: { prelude?: string; epilogue?: string } = {},
): SurveyDefinition {
  return { ...options, questions };
}

export const none = (): QuestionKind => ({ type: "none" });

export const input = (options: Omit<InputKind, "type"> = {}): InputKind => ({ type: "input", ...options });

export const multiline = (options: Omit<MultilineKind, "type"> = {}): MultilineKind => ({
  type: "multiline",
  ...options,
});

export const masked = (options: Omit<MaskedKind, "type"> = {}): MaskedKind => ({ type: "masked", ...options });

export const int = (options: Omit<IntKind, "type"> = {}): IntKind => ({ type: "int", ...options });

export const float = (options: Omit<FloatKind, "type"> = {}): FloatKind => ({ type: "float", ...options });

export const confirm = (defaultValue = false): ConfirmKind => ({ type: "confirm", default: defaultValue });

export const list = (element: ListElementKind, options: { minItems?: number; maxItems?: number } = {}): ListKind => ({
  type: "list",
  element,
  ...options,
});

export const allOf = (questions: Question[]): AllOfKind => ({ type: "all_of", questions });

export const oneOf = (variants: Variant[], defaultIndex?: number): OneOfKind =>
  defaultIndex === undefined ? { type: "one_of", variants } : { type: "one_of", variants, default: defaultIndex };

export const anyOf = (variants: Variant[], defaults: number[] = []): AnyOfKind => ({
  type: "any_of",
  variants,
  defaults: [...defaults],
});

export const variant = (name: string, kind: QuestionKind): Variant => ({ name, kind });

export const unitVariant = (name: string): Variant => variant(name, none());

export function suggested(value: ResponseValue): DefaultValue {
  return { type: "suggested", value };
}

export function assumed(value: ResponseValue): DefaultValue {
  return { type: "assumed", value };
}

export function isAssumed(q: Question): boolean {
  return q.default.type === "assumed";
}
