/**
 * Runtime configuration read from the environment (.env in the workspace root)
 */

import { config as loadDotenv } from "dotenv";
import type { ZodError } from "zod";
import { EnvSchema, REQUIRED_ENV_KEYS } from "./schemas";
import { ConfigError } from "./errors";
import type { LogLevelName } from "@/utils/logger";

export interface AppConfig {
  googleApiKey: string;
  asana: {
    pat: string;
    workspaceGid: string;
    projectGid: string;
  };
  gmail: {
    user?: string;
    appPassword?: string;
  };
  chatModel: string;
  role: string;
  timezone: string;
  companyName: string;
  hrFallbackEmail: string;
  joinedSinceDays: number;
  logLevel: LogLevelName;
}

type Env = Record<string, string | undefined>;

/**
 * Load `<root>/.env` into process.env. Existing variables win.
 */
export function loadEnvFile(path: string) {
  loadDotenv({ path });
}

/**
 * Validate the environment and build the app config.
 * Reports every missing required variable in one error.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const missing = REQUIRED_ENV_KEYS.filter((key) => !env[key]);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`);
  }

  // Empty strings count as unset for optional keys
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") cleaned[key] = value;
  }

  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    throwValidationError(result.error);
  }
  const parsed = result.data;

  return {
    googleApiKey: parsed.GOOGLE_API_KEY,
    asana: {
      pat: parsed.ASANA_PAT,
      workspaceGid: parsed.ASANA_WORKSPACE_GID,
      projectGid: parsed.ASANA_PROJECT_GID,
    },
    gmail: {
      user: parsed.GMAIL_USER,
      appPassword: parsed.GMAIL_APP_PASSWORD,
    },
    chatModel: parsed.CHAT_MODEL,
    role: parsed.ONBOARDING_ROLE,
    timezone: parsed.ONBOARDING_TIMEZONE,
    companyName: parsed.COMPANY_NAME,
    hrFallbackEmail: parsed.HR_FALLBACK_EMAIL,
    joinedSinceDays: parsed.JOINED_SINCE_DAYS,
    logLevel: parsed.LOG_LEVEL,
  };
}

function throwValidationError(error: ZodError): never {
  const lines = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `  ${path}: ${issue.message}`;
  });
  throw new ConfigError(`Invalid environment:\n${lines.join("\n")}\n\nFix with: onboardia init`);
}
