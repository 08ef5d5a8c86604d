/**
 * Google OAuth2 client for the Calendar API
 *
 * Client credentials come from the OAuth client file downloaded from the
 * Google Cloud console (credentials.json). Access and refresh tokens live in
 * token.json and are written back whenever Google refreshes them.
 */

import { existsSync, readFileSync, writeFileSync } from "fs";
import { google } from "googleapis";
import { GoogleCredentialsSchema, GoogleTokenSchema } from "@/core/schemas";
import { IntegrationError, errorMessage } from "@/core/errors";
import { logger } from "@/utils/logger";

const log = logger.google;

export const GOOGLE_SCOPES = ["https://www.googleapis.com/auth/calendar"];

export type GoogleOAuthClient = InstanceType<typeof google.auth.OAuth2>;

export interface GoogleAuthPaths {
  credentialsPath: string;
  tokenPath: string;
}

// ============================================================================
// Client construction
// ============================================================================

function readJson(path: string, label: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new IntegrationError("google-auth", `reading ${label}`, errorMessage(error));
  }
}

/**
 * OAuth client built from credentials.json, without tokens
 */
export function createOAuthClient(credentialsPath: string): GoogleOAuthClient {
  if (!existsSync(credentialsPath)) {
    throw new IntegrationError(
      "google-auth",
      "setup",
      `OAuth client file not found at ${credentialsPath}. Download it from the Google Cloud console.`
    );
  }

  const parsed = GoogleCredentialsSchema.safeParse(readJson(credentialsPath, "credentials.json"));
  if (!parsed.success) {
    throw new IntegrationError("google-auth", "setup", "credentials.json is not an OAuth client file");
  }

  const client = "installed" in parsed.data ? parsed.data.installed : parsed.data.web;
  return new google.auth.OAuth2(client.client_id, client.client_secret, client.redirect_uris[0]);
}

/**
 * OAuth client with stored tokens; refreshed tokens are persisted to token.json
 */
export function getAuthorizedClient({ credentialsPath, tokenPath }: GoogleAuthPaths): GoogleOAuthClient {
  const client = createOAuthClient(credentialsPath);

  if (!existsSync(tokenPath)) {
    throw new IntegrationError(
      "google-auth",
      "authorization",
      "No stored Google token. Run `onboardia auth` first."
    );
  }

  const token = GoogleTokenSchema.safeParse(readJson(tokenPath, "token.json"));
  if (!token.success || !token.data.refresh_token) {
    throw new IntegrationError(
      "google-auth",
      "authorization",
      "Stored Google token is invalid or has no refresh token. Run `onboardia auth` again."
    );
  }

  client.setCredentials(token.data);

  client.on("tokens", (tokens) => {
    const merged = { ...token.data, ...tokens };
    writeFileSync(tokenPath, JSON.stringify(merged, null, 2));
    log.debug("Refreshed Google token saved", { tokenPath });
  });

  return client;
}

// ============================================================================
// Consent flow
// ============================================================================

export function generateConsentUrl(client: GoogleOAuthClient): string {
  return client.generateAuthUrl({
    access_type: "offline",
    prompt: "consent",
    scope: GOOGLE_SCOPES,
  });
}

/**
 * Accepts either the raw authorization code or the full redirect URL
 * (http://localhost/?code=...&scope=...) pasted from the browser.
 */
export function extractAuthCode(input: string): string {
  const trimmed = input.trim();
  if (/^https?:\/\//.test(trimmed)) {
    const code = new URL(trimmed).searchParams.get("code");
    if (!code) {
      throw new IntegrationError("google-auth", "consent", "Redirect URL has no `code` parameter");
    }
    return code;
  }
  return trimmed;
}

/**
 * Exchange the authorization code and write token.json
 */
export async function exchangeAuthCode(
  client: GoogleOAuthClient,
  code: string,
  tokenPath: string,
): Promise<void> {
  try {
    const { tokens } = await client.getToken(code);
    writeFileSync(tokenPath, JSON.stringify(tokens, null, 2));
    log.info("Google token saved", { tokenPath, hasRefreshToken: !!tokens.refresh_token });
  } catch (error) {
    throw new IntegrationError("google-auth", "token exchange", errorMessage(error));
  }
}
