import { z } from "zod";

/**
 * Zod validation schemas for configuration and directory input
 */

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Employee fields accepted by the directory
 */
export const NewEmployeeSchema = z.object({
  name: z.string().min(1),
  email: z.string().email(),
  role: z.string().min(1),
  department: z.string().min(1),
  date_joined: z.string().regex(ISO_DATE, "Expected an ISO date (YYYY-MM-DD)"),
  location: z.string().min(1),
  level: z.enum(["junior", "senior"]),
  manager_email: z.string().email().nullable().default(null),
});

/**
 * Environment schema: required keys are checked separately so every missing
 * name can be reported at once
 */
export const REQUIRED_ENV_KEYS = [
  "GOOGLE_API_KEY",
  "ASANA_WORKSPACE_GID",
  "ASANA_PROJECT_GID",
  "ASANA_PAT",
] as const;

export const EnvSchema = z.object({
  GOOGLE_API_KEY: z.string(),
  ASANA_WORKSPACE_GID: z.string(),
  ASANA_PROJECT_GID: z.string(),
  ASANA_PAT: z.string(),
  CHAT_MODEL: z.string().default("google-genai:gemini-2.5-flash"),
  ONBOARDING_ROLE: z.string().default("Data Engineer"),
  ONBOARDING_TIMEZONE: z.string().default("Asia/Kolkata"),
  COMPANY_NAME: z.string().default("Acme Labs"),
  HR_FALLBACK_EMAIL: z.string().email().default("hr@company.com"),
  JOINED_SINCE_DAYS: z.coerce.number().int().positive().default(14),
  GMAIL_USER: z.string().optional(),
  GMAIL_APP_PASSWORD: z.string().optional(),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
});

/**
 * OAuth client file downloaded from Google Cloud console
 */
const OAuthClientSchema = z.object({
  client_id: z.string(),
  client_secret: z.string(),
  redirect_uris: z.array(z.string()).min(1),
});

export const GoogleCredentialsSchema = z.union([
  z.object({ installed: OAuthClientSchema }),
  z.object({ web: OAuthClientSchema }),
]);

export const GoogleTokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  scope: z.string().optional(),
  token_type: z.string().nullish(),
  expiry_date: z.number().nullish(),
});
