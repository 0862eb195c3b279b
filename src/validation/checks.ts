// src/validation/checks.ts
// Built-in checks every answer gets before schema validators run

import type { ResponseValue, ResponseValueType } from "@/responses";
import type { ListElementKind, QuestionKind } from "@/survey/types";

import type { ValidationResult } from "./types";

export const VALID: ValidationResult = { valid: true };

export function invalid(message: string): ValidationResult {
  return { valid: false, message };
}

/** The value tag a question kind answers with, if it answers at all */
export function expectedValueType(kind: QuestionKind): ResponseValueType | undefined {
  switch (kind.type) {
    case "input":
    case "multiline":
    case "masked":
      return "text";
    case "int":
      return "int";
    case "float":
      return "float";
    case "confirm":
      return "bool";
    case "list":
      return listValueType(kind.element);
    case "one_of":
      return "chosen_variant";
    case "any_of":
      return "chosen_variants";
    case "none":
    case "all_of":
      return undefined;
  }
}

function listValueType(element: ListElementKind): ResponseValueType {
  switch (element.type) {
    case "text":
      return "text_list";
    case "int":
      return "int_list";
    case "float":
      return "float_list";
  }
}

function checkBounds(value: number, min: number | undefined, max: number | undefined): ValidationResult {
  if (min !== undefined && value < min) return invalid(`Value must be at least ${min}`);
  if (max !== undefined && value > max) return invalid(`Value must be at most ${max}`);
  return VALID;
}

function checkIndex(index: number, count: number): ValidationResult {
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    return invalid(`Selection ${index} is out of range (${count} options)`);
  }
  return VALID;
}

/**
 * Checks that `value` is a well-formed answer for `kind`: matching tag,
 * numeric bounds, list sizes and in-range variant selections.
 */
export function checkAnswer(kind: QuestionKind, value: ResponseValue): ValidationResult {
  const expected = expectedValueType(kind);
  if (expected === undefined) return invalid(`Questions of kind ${kind.type} take no answer`);
  if (value.type !== expected) return invalid(`Expected ${expected}, got ${value.type}`);

  if (kind.type === "int" && value.type === "int") {
    if (!Number.isSafeInteger(value.value)) return invalid("Value must be a whole number");
    return checkBounds(value.value, kind.min, kind.max);
  }

  if (kind.type === "float" && value.type === "float") {
    if (!Number.isFinite(value.value)) return invalid("Value must be a finite number");
    return checkBounds(value.value, kind.min, kind.max);
  }

  if (kind.type === "list" && (value.type === "text_list" || value.type === "int_list" || value.type === "float_list")) {
    const count = value.values.length;
    if (kind.minItems !== undefined && count < kind.minItems) return invalid(`At least ${kind.minItems} item(s) required`);
    if (kind.maxItems !== undefined && count > kind.maxItems) return invalid(`At most ${kind.maxItems} item(s) allowed`);
    const element = kind.element;
    if (element.type !== "text") {
      for (const item of value.values) {
        if (typeof item !== "number") continue;
        if (element.type === "int" && !Number.isSafeInteger(item)) return invalid("Items must be whole numbers");
        const bounded = checkBounds(item, element.min, element.max);
        if (!bounded.valid) return bounded;
      }
    }
    return VALID;
  }

  if (kind.type === "one_of" && value.type === "chosen_variant") {
    return checkIndex(value.index, kind.variants.length);
  }

  if (kind.type === "any_of" && value.type === "chosen_variants") {
    for (const index of value.indices) {
      const inRange = checkIndex(index, kind.variants.length);
      if (!inRange.valid) return inRange;
    }
    if (new Set(value.indices).size !== value.indices.length) return invalid("Each option can be selected once");
    return VALID;
  }

  return VALID;
}
