// src/survey/types.ts
import type { ResponsePath } from "@/path";
import type { ReadonlyResponses, Responses, ResponseValue } from "@/responses";
import type { CompositeValidator, FieldValidator } from "@/validation/types";

/** A question's effective default: none, an editable suggestion, or a fixed assumption */
export type DefaultValue =
  | { type: "none" }
  | { type: "suggested"; value: ResponseValue }
  | { type: "assumed"; value: ResponseValue };

export interface InputKind {
  type: "input";
  default?: string;
}

export interface MultilineKind {
  type: "multiline";
  default?: string;
}

export interface MaskedKind {
  type: "masked";
  /** Character shown in place of typed input (surfaces fall back to `*`) */
  mask?: string;
}

export interface IntKind {
  type: "int";
  default?: number;
  min?: number;
  max?: number;
}

export interface FloatKind {
  type: "float";
  default?: number;
  min?: number;
  max?: number;
}

export interface ConfirmKind {
  type: "confirm";
  default: boolean;
}

export type ListElementKind =
  | { type: "text" }
  | { type: "int"; min?: number; max?: number }
  | { type: "float"; min?: number; max?: number };

export interface ListKind {
  type: "list";
  element: ListElementKind;
  minItems?: number;
  maxItems?: number;
}

export interface AllOfKind {
  type: "all_of";
  questions: Question[];
}

export interface OneOfKind {
  type: "one_of";
  variants: Variant[];
  default?: number;
}

export interface AnyOfKind {
  type: "any_of";
  variants: Variant[];
  defaults: number[];
}

export type LeafKind = InputKind | MultilineKind | MaskedKind | IntKind | FloatKind | ConfirmKind | ListKind;

export type QuestionKind = { type: "none" } | LeafKind | AllOfKind | OneOfKind | AnyOfKind;

export type QuestionKindType = QuestionKind["type"];

/**
 * One option of a OneOf/AnyOf. Its identity is its position in the list, so
 * renaming is safe but reordering between collection and reconstruction is not.
 */
export interface Variant {
  name: string;
  kind: QuestionKind;
}

export interface Question {
  /** Relative to the enclosing group; usually a single field name */
  path: ResponsePath;
  ask: string;
  kind: QuestionKind;
  default: DefaultValue;
}

export interface SurveyDefinition {
  prelude?: string;
  questions: Question[];
  epilogue?: string;
}

/**
 * What a schema type provides to the core. Written by hand once per type.
 */
export interface Survey<T> {
  /** A fresh question tree; never shared between runs */
  definition(): SurveyDefinition;
  /** Pure projection of a fully answered store */
  fromResponses(responses: ReadonlyResponses): T;
  /** Inverse of fromResponses, used to turn an instance into suggestions or assumptions */
  toResponses(value: T): Responses;
  validateField?: FieldValidator;
  validateAll?: CompositeValidator;
}
