/**
 * onboardia init -- interactive setup wizard
 *
 * Creates a `.onboardia/` workspace in the current directory with:
 *   - employees.db       (sample employee directory, optional)
 *   - credentials.json   (Google OAuth client, copied from user-provided path)
 *   - ../.env            (API keys and defaults, written to workspace root)
 */

import * as clack from "@clack/prompts";
import { existsSync } from "fs";
import { mkdir, copyFile, writeFile } from "fs/promises";
import { resolve } from "path";
import { EmployeeDirectory } from "@/services/directory";
import {
  WORKSPACE_DIR_NAME,
  configDir,
  databasePath,
  envFilePath,
  googleCredentialsPath,
} from "./workspace";

// ============================================================================
// .env rendering
// ============================================================================

export interface EnvValues {
  googleApiKey: string;
  asanaPat: string;
  asanaWorkspaceGid: string;
  asanaProjectGid: string;
  gmailUser?: string;
  gmailAppPassword?: string;
  companyName: string;
  role: string;
  timezone: string;
}

export function renderEnvFile(values: EnvValues): string {
  const lines = [
    "CHAT_MODEL=google-genai:gemini-2.5-flash",
    `GOOGLE_API_KEY=${values.googleApiKey}`,
    `ASANA_PAT=${values.asanaPat}`,
    `ASANA_WORKSPACE_GID=${values.asanaWorkspaceGid}`,
    `ASANA_PROJECT_GID=${values.asanaProjectGid}`,
    `COMPANY_NAME=${values.companyName}`,
    `ONBOARDING_ROLE=${values.role}`,
    `ONBOARDING_TIMEZONE=${values.timezone}`,
  ];
  if (values.gmailUser) lines.push(`GMAIL_USER=${values.gmailUser}`);
  if (values.gmailAppPassword) lines.push(`GMAIL_APP_PASSWORD=${values.gmailAppPassword}`);
  lines.push(""); // trailing newline
  return lines.join("\n");
}

const expandHome = (p: string) => resolve(p.replace(/^~/, process.env.HOME || "~"));

const required = (label: string) => (v: string) => (!v ? `${label} is required` : undefined);

// ============================================================================
// Init Command
// ============================================================================

export async function runInit() {
  const root = process.cwd();
  const wsDir = configDir(root);

  clack.intro("onboardia setup");

  // Warn if workspace already exists
  if (existsSync(wsDir)) {
    const overwrite = await clack.confirm({
      message: `A ${WORKSPACE_DIR_NAME}/ directory already exists here. Overwrite?`,
    });
    if (clack.isCancel(overwrite) || !overwrite) {
      clack.outro("Setup cancelled.");
      return;
    }
  }

  // ------------------------------------------------------------------
  // 1. Company defaults
  // ------------------------------------------------------------------

  const companyName = await clack.text({
    message: "Company name (used in welcome emails)",
    placeholder: "Acme Labs",
    validate: required("Company name"),
  });
  if (clack.isCancel(companyName)) return cancel();

  const role = await clack.text({
    message: "Role to onboard",
    placeholder: "Data Engineer",
    initialValue: "Data Engineer",
    validate: required("Role"),
  });
  if (clack.isCancel(role)) return cancel();

  const timezone = await clack.text({
    message: "Time zone for intro calls (IANA name)",
    placeholder: "Asia/Kolkata",
    initialValue: "Asia/Kolkata",
    validate: required("Time zone"),
  });
  if (clack.isCancel(timezone)) return cancel();

  // ------------------------------------------------------------------
  // 2. API Keys
  // ------------------------------------------------------------------

  clack.note(
    [
      "You'll need credentials from these services:",
      "",
      "  Gemini        ->  https://aistudio.google.com/apikey",
      "  Asana PAT     ->  https://app.asana.com/0/my-apps",
      "  Google OAuth  ->  Google Cloud console (Desktop app client, Calendar API enabled)",
      "",
      "Gmail app password is needed to send welcome emails.",
    ].join("\n"),
    "API Keys"
  );

  const googleApiKey = await clack.text({
    message: "GOOGLE_API_KEY",
    placeholder: "AI...",
    validate: required("Gemini API key"),
  });
  if (clack.isCancel(googleApiKey)) return cancel();

  const asanaPat = await clack.text({
    message: "ASANA_PAT",
    placeholder: "Personal access token",
    validate: required("Asana token"),
  });
  if (clack.isCancel(asanaPat)) return cancel();

  const asanaWorkspaceGid = await clack.text({
    message: "ASANA_WORKSPACE_GID",
    validate: required("Workspace GID"),
  });
  if (clack.isCancel(asanaWorkspaceGid)) return cancel();

  const asanaProjectGid = await clack.text({
    message: "ASANA_PROJECT_GID",
    validate: required("Project GID"),
  });
  if (clack.isCancel(asanaProjectGid)) return cancel();

  const gmailUser = await clack.text({
    message: "GMAIL_USER (sender address)",
    placeholder: "hr@yourcompany.com",
  });
  if (clack.isCancel(gmailUser)) return cancel();

  const gmailAppPassword = await clack.text({
    message: "GMAIL_APP_PASSWORD",
    placeholder: "xxxx-xxxx-xxxx-xxxx",
  });
  if (clack.isCancel(gmailAppPassword)) return cancel();

  const credentialsInput = await clack.text({
    message: "Path to Google OAuth client file (optional, needed for calendar invites)",
    placeholder: "~/Downloads/credentials.json",
    validate: (v) => {
      if (!v) return undefined; // optional
      const p = expandHome(v);
      if (!existsSync(p)) return `File not found: ${p}`;
      return undefined;
    },
  });
  if (clack.isCancel(credentialsInput)) return cancel();

  const seed = await clack.confirm({
    message: "Seed the employee directory with sample data?",
    initialValue: true,
  });
  if (clack.isCancel(seed)) return cancel();

  // ------------------------------------------------------------------
  // 3. Write everything to disk
  // ------------------------------------------------------------------

  const s = clack.spinner();
  s.start("Writing workspace files...");

  await mkdir(wsDir, { recursive: true });

  if (credentialsInput) {
    await copyFile(expandHome(credentialsInput), googleCredentialsPath(root));
  }

  const directory = new EmployeeDirectory(databasePath(root));
  try {
    directory.bootstrap({ role, empty: !seed });
  } finally {
    directory.close();
  }

  await writeFile(
    envFilePath(root),
    renderEnvFile({
      googleApiKey,
      asanaPat,
      asanaWorkspaceGid,
      asanaProjectGid,
      gmailUser: gmailUser || undefined,
      gmailAppPassword: gmailAppPassword || undefined,
      companyName,
      role,
      timezone,
    })
  );

  s.stop("Workspace created!");

  // ------------------------------------------------------------------
  // 4. Summary
  // ------------------------------------------------------------------

  clack.note(
    [
      `${WORKSPACE_DIR_NAME}/`,
      "  employees.db",
      credentialsInput ? "  credentials.json" : null,
      ".env",
    ]
      .filter(Boolean)
      .join("\n"),
    "Created"
  );

  clack.outro(
    credentialsInput
      ? "Next: connect Google Calendar with  onboardia auth"
      : "Add .onboardia/credentials.json, then run  onboardia auth"
  );
}

// ============================================================================
// Helpers
// ============================================================================

function cancel() {
  clack.outro("Setup cancelled.");
}
