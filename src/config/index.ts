// src/config/index.ts
export { ConfigError, type ConfigErrorType, defaultConfigDir, loadConfig } from "./loader";
export {
  OverridesSchema,
  type ReservedSegmentPolicy,
  ReservedSegmentPolicySchema,
  type SurveyorConfig,
  SurveyorConfigSchema,
} from "./schema";
