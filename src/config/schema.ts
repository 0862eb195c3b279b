// src/config/schema.ts
import * as v from "valibot";

import { ResponseValueSchema } from "@/responses/schema";

export const ReservedSegmentPolicySchema = v.picklist(["ignore", "warn", "error"]);

/** Overrides keyed by dotted path, e.g. `"server.port"` */
export const OverridesSchema = v.record(v.pipe(v.string(), v.minLength(1)), ResponseValueSchema);

export const SurveyorConfigSchema = v.object({
  debug: v.optional(v.boolean()),
  reservedSegments: v.optional(ReservedSegmentPolicySchema),
  suggestions: v.optional(OverridesSchema),
  assumptions: v.optional(OverridesSchema),
});

export type ReservedSegmentPolicy = v.InferOutput<typeof ReservedSegmentPolicySchema>;
export type SurveyorConfig = v.InferOutput<typeof SurveyorConfigSchema>;
