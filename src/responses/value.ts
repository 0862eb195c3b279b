// src/responses/value.ts
import type { ResponseValue } from "./types";

export const text = (value: string): ResponseValue => ({ type: "text", value });
export const int = (value: number): ResponseValue => ({ type: "int", value });
export const float = (value: number): ResponseValue => ({ type: "float", value });
export const bool = (value: boolean): ResponseValue => ({ type: "bool", value });
export const chosenVariant = (index: number): ResponseValue => ({ type: "chosen_variant", index });
export const chosenVariants = (indices: number[]): ResponseValue => ({ type: "chosen_variants", indices: [...indices] });
export const textList = (values: string[]): ResponseValue => ({ type: "text_list", values: [...values] });
export const intList = (values: number[]): ResponseValue => ({ type: "int_list", values: [...values] });
export const floatList = (values: number[]): ResponseValue => ({ type: "float_list", values: [...values] });

/** Copies the arrays a value owns so stores never share them */
export function cloneValue(value: ResponseValue): ResponseValue {
  switch (value.type) {
    case "chosen_variants":
      return chosenVariants(value.indices);
    case "text_list":
      return textList(value.values);
    case "int_list":
      return intList(value.values);
    case "float_list":
      return floatList(value.values);
    default:
      return { ...value };
  }
}

export function valuesEqual(a: ResponseValue, b: ResponseValue): boolean {
  if (a.type !== b.type) return false;
  return JSON.stringify(a) === JSON.stringify(b);
}

/** Short human form used in log lines and error messages */
export function describeValue(value: ResponseValue): string {
  switch (value.type) {
    case "text":
      return JSON.stringify(value.value);
    case "int":
    case "float":
    case "bool":
      return String(value.value);
    case "chosen_variant":
      return `#${value.index}`;
    case "chosen_variants":
      return `{${value.indices.join(",")}}`;
    case "text_list":
    case "int_list":
    case "float_list":
      return `[${value.values.map((v) => JSON.stringify(v)).join(", ")}]`;
  }
}
