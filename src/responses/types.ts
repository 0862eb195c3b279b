// src/responses/types.ts
// One collected answer. The `type` tag decides which Responses accessor succeeds.

export type ResponseValue =
  | { type: "text"; value: string }
  | { type: "int"; value: number }
  | { type: "float"; value: number }
  | { type: "bool"; value: boolean }
  | { type: "chosen_variant"; index: number }
  | { type: "chosen_variants"; indices: number[] }
  | { type: "text_list"; values: string[] }
  | { type: "int_list"; values: number[] }
  | { type: "float_list"; values: number[] };

export type ResponseValueType = ResponseValue["type"];

/** Narrows a ResponseValue to the member carrying the given tag */
export type ResponseValueOf<T extends ResponseValueType> = Extract<ResponseValue, { type: T }>;
