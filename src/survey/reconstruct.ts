// src/survey/reconstruct.ts
// Addressing helpers for hand-written fromResponses/toResponses implementations

import { POSITIONAL_KEY, SELECTED_VARIANTS_KEY, SELECTED_VARIANT_KEY } from "@/constants";
import type { ResponsePath } from "@/path";
import type { ReadonlyResponses } from "@/responses";

/** Index of the variant chosen for the OneOf at `path` */
export function selectedVariant(responses: ReadonlyResponses, path: ResponsePath): number {
  return responses.getChosenVariant(path.child(SELECTED_VARIANT_KEY));
}

/** Indices chosen for the AnyOf at `path`, in the order they were stored */
export function selectedVariants(responses: ReadonlyResponses, path: ResponsePath): readonly number[] {
  return responses.getChosenVariants(path.child(SELECTED_VARIANTS_KEY));
}

export function selectedVariantPath(path: ResponsePath): ResponsePath {
  return path.child(SELECTED_VARIANT_KEY);
}

export function selectedVariantsPath(path: ResponsePath): ResponsePath {
  return path.child(SELECTED_VARIANTS_KEY);
}

/** Namespace of the AnyOf variant at `index`, so two selected variants never collide */
export function variantDataPath(path: ResponsePath, index: number): ResponsePath {
  return path.child(String(index));
}

/** Where a single unnamed payload of a variant lives */
export function positionalPath(path: ResponsePath): ResponsePath {
  return path.child(POSITIONAL_KEY);
}
