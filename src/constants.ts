// src/constants.ts
// Centralized constants for the survey core

/** Segment under a OneOf question's path that holds the chosen variant index */
export const SELECTED_VARIANT_KEY = "selected_variant";

/** Segment under an AnyOf question's path that holds the chosen variant indices */
export const SELECTED_VARIANTS_KEY = "selected_variants";

/** Segment holding the payload of a variant that carries a single unnamed value */
export const POSITIONAL_KEY = "0";

/** Config file name looked up inside the config directory */
export const CONFIG_FILE_NAME = "surveyor.json";
