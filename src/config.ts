// PitchScoop - Environment configuration
// Read once at startup. index.ts imports "dotenv/config" before calling loadConfig(),
// so values from .env are already merged into process.env here.

import { z } from "zod";
import { formatZodIssues } from "./validation.js";
import type { LogLevel } from "./logger.js";

const required = (name: string) =>
  z.string({ required_error: `${name} is not set` }).trim().min(1, `${name} is empty`);

const integerFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
  PORT: integerFromEnv(8000, 0),
  PUBLIC_BASE_URL: z.string().url().optional(),
  SYSTEM_LLM_AZURE_ENDPOINT: required("SYSTEM_LLM_AZURE_ENDPOINT").pipe(z.string().url()),
  SYSTEM_LLM_AZURE_API_KEY: required("SYSTEM_LLM_AZURE_API_KEY"),
  SYSTEM_LLM_AZURE_DEPLOYMENT: required("SYSTEM_LLM_AZURE_DEPLOYMENT"),
  SYSTEM_LLM_AZURE_API_VERSION: required("SYSTEM_LLM_AZURE_API_VERSION"),
  LLM_TIMEOUT_MS: integerFromEnv(60_000, 1),
  LLM_MAX_RETRIES: integerFromEnv(0, 0),
  AUDIO_STORAGE_DIR: z.string().trim().min(1).default("recordings"),
  PLAYBACK_URL_SECRET: required("PLAYBACK_URL_SECRET"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface AzureOpenAIConfig {
  endpoint: string;
  apiKey: string;
  deployment: string;
  apiVersion: string;
  timeoutMs: number;
  maxRetries: number;
}

export interface AppConfig {
  port: number;
  publicBaseUrl: string;
  azure: AzureOpenAIConfig;
  audioStorageDir: string;
  playbackUrlSecret: string;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Builds the application config from an environment map.
 * Empty strings count as unset so a blank line in .env falls back to the default.
 * @throws ConfigError listing every invalid or missing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(formatZodIssues(result.error));
  }
  const vars = result.data;

  return {
    port: vars.PORT,
    publicBaseUrl: (vars.PUBLIC_BASE_URL ?? `http://localhost:${vars.PORT}`).replace(/\/+$/, ""),
    azure: {
      endpoint: vars.SYSTEM_LLM_AZURE_ENDPOINT,
      apiKey: vars.SYSTEM_LLM_AZURE_API_KEY,
      deployment: vars.SYSTEM_LLM_AZURE_DEPLOYMENT,
      apiVersion: vars.SYSTEM_LLM_AZURE_API_VERSION,
      timeoutMs: vars.LLM_TIMEOUT_MS,
      maxRetries: vars.LLM_MAX_RETRIES,
    },
    audioStorageDir: vars.AUDIO_STORAGE_DIR,
    playbackUrlSecret: vars.PLAYBACK_URL_SECRET,
    logLevel: vars.LOG_LEVEL,
  };
}
