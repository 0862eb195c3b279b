// src/config/loader.ts
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";

import * as v from "valibot";

import { CONFIG_FILE_NAME } from "@/constants";

import { type SurveyorConfig, SurveyorConfigSchema } from "./schema";

export type { ReservedSegmentPolicy, SurveyorConfig } from "./schema";

export type ConfigErrorType = "invalid_json" | "invalid_config";

export class ConfigError extends Error {
  constructor(
    public readonly type: ConfigErrorType,
    public readonly file: string,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function defaultConfigDir(): string {
  return join(homedir(), ".config", "surveyor");
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load configuration from <configDir>/surveyor.json (default ~/.config/surveyor).
 * Returns null when the file does not exist.
 */
export async function loadConfig(configDir?: string): Promise<SurveyorConfig | null> {
  const configPath = join(configDir ?? defaultConfigDir(), CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError("invalid_json", configPath, `Config file is not valid JSON: ${configPath}`, error);
  }

  const result = v.safeParse(SurveyorConfigSchema, parsed);
  if (!result.success) {
    const issues = result.issues.map((issue) => {
      const where = v.getDotPath(issue);
      return where ? `${where}: ${issue.message}` : issue.message;
    });
    throw new ConfigError("invalid_config", configPath, `Invalid config ${configPath}: ${issues.join("; ")}`);
  }

  return result.output;
}
