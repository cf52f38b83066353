/**
 * Environment Configuration
 *
 * Parses process.env into a typed AppConfig. A missing model API key is a
 * startup-fatal ConfigurationError.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";
import { DEFAULT_MODEL } from "./models";
import { PROVIDER_CONSTANTS } from "./constants";
import { ConfigurationError } from "../utils/errorHandler";
import type { LogLevel } from "../utils/logger";

// Treat `FOO=` in a .env file the same as an unset variable
const optionalText = z.preprocess(
  value => (value === "" ? undefined : value),
  z.string().trim().min(1).optional(),
);

const envSchema = z.object({
  GEMINI_API_KEY: optionalText,
  GOOGLE_API_KEY: optionalText,
  GEMINI_MODEL: optionalText,
  MCP_SERVER_SCRIPT: optionalText,
  MCP_SERVER_COMMAND: optionalText,
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().trim().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  LOG_DIR: optionalText,
});

export type AppConfig = {
  geminiApiKey: string;
  geminiModel: string;
  /** Provider target: the script the provider process runs. */
  providerScript: string;
  providerCommand: string;
  /** Arguments placed before the target script. */
  providerCommandArgs: string[];
  port: number;
  host: string;
  logLevel: LogLevel;
  logDir?: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(fromZodError(parsed.error).message);
  }

  const vars = parsed.data;
  const apiKey = vars.GEMINI_API_KEY ?? vars.GOOGLE_API_KEY;
  if (!apiKey) {
    throw new ConfigurationError("GEMINI_API_KEY is not set");
  }

  // A custom command is used as-is; the default runs the TypeScript provider through tsx
  const customCommand = vars.MCP_SERVER_COMMAND;

  return {
    geminiApiKey: apiKey,
    geminiModel: vars.GEMINI_MODEL ?? DEFAULT_MODEL,
    providerScript: vars.MCP_SERVER_SCRIPT ?? PROVIDER_CONSTANTS.DEFAULT_SCRIPT,
    providerCommand: customCommand ?? process.execPath,
    providerCommandArgs: customCommand ? [] : ["--import", "tsx"],
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    ...(vars.LOG_DIR !== undefined && { logDir: vars.LOG_DIR }),
  };
}
