// src/responses/schema.ts
// Runtime parsing of ResponseValues written by hand (config files, fixtures)

import * as v from "valibot";

import type { ResponseValue } from "./types";

const Index = v.pipe(v.number(), v.integer(), v.minValue(0));
const Integer = v.pipe(v.number(), v.integer());
const Finite = v.pipe(v.number(), v.finite());

export const ResponseValueSchema = v.variant("type", [
  v.object({ type: v.literal("text"), value: v.string() }),
  v.object({ type: v.literal("int"), value: Integer }),
  v.object({ type: v.literal("float"), value: Finite }),
  v.object({ type: v.literal("bool"), value: v.boolean() }),
  v.object({ type: v.literal("chosen_variant"), index: Index }),
  v.object({ type: v.literal("chosen_variants"), indices: v.array(Index) }),
  v.object({ type: v.literal("text_list"), values: v.array(v.string()) }),
  v.object({ type: v.literal("int_list"), values: v.array(Integer) }),
  v.object({ type: v.literal("float_list"), values: v.array(Finite) }),
]);

/**
 * Type guard for a well-formed ResponseValue
 */
export function isResponseValue(value: unknown): value is ResponseValue {
  return v.is(ResponseValueSchema, value);
}

/**
 * Parses an unknown value, throwing valibot's ValiError when it is not a ResponseValue
 */
export function parseResponseValue(value: unknown): ResponseValue {
  return v.parse(ResponseValueSchema, value);
}
