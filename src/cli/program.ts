/**
 * onboardia command definitions
 *
 * Commands:
 *   (none)  - Pick a mode interactively (onboarding workflow or chat)
 *   init    - Interactive workspace setup (.onboardia/, .env)
 *   auth    - Connect Google Calendar (OAuth consent)
 *   seed    - Recreate the employee directory with sample data
 *   joiners - List new joiners the workflow would pick up
 *   onboard - Run the onboarding workflow for new joiners
 *   chat    - Chat with the HR assistant
 */

import { Command, InvalidArgumentError } from "commander";
import { resolve } from "path";
import * as clack from "@clack/prompts";
import { buildOnboardingGraph } from "@/agents/onboarding";
import { runOnboardingForNewJoiners } from "@/agents/runner";
import { createChatModel } from "@/agents/model";
import { loadConfig, loadEnvFile, type AppConfig } from "@/core/config";
import { errorMessage } from "@/core/errors";
import type { Employee, RunSummary } from "@/core/types";
import { EmployeeDirectory } from "@/services/directory";
import { createLiveServices } from "@/services/index";
import {
  createOAuthClient,
  exchangeAuthCode,
  extractAuthCode,
  generateConsentUrl,
} from "@/services/google-auth";
import { logger, setLogLevel, type LogLevelName } from "@/utils/logger";
import {
  findWorkspaceRoot,
  databasePath,
  envFilePath,
  googleCredentialsPath,
  googleTokenPath,
} from "./workspace";
import { runInit } from "./init";
import { runChat } from "./chat";
import { formatJoinersTable, renderRunEvent, formatRunSummary } from "./render";

export const VERSION = "0.1.0";

// ============================================================================
// Helpers
// ============================================================================

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Expected a positive whole number of days.");
  }
  return n;
}

/** Run an action, printing errors with clack and exiting non-zero */
function guarded<A extends unknown[]>(action: (...args: A) => Promise<void>) {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (error) {
      clack.log.error(errorMessage(error));
      clack.outro("Exiting.");
      process.exit(1);
    }
  };
}

// ============================================================================
// Workspace loading
// ============================================================================

export interface WorkspaceOptions {
  dir?: string;
  verbose?: boolean;
}

function resolveRoot(options: WorkspaceOptions): string {
  const root = options.dir ? resolve(options.dir) : findWorkspaceRoot();
  if (!root) {
    throw new Error(
      "No onboardia workspace found.\nRun `onboardia init` to set one up, or use --dir to point to one."
    );
  }
  return root;
}

interface Workspace {
  root: string;
  config: AppConfig;
  directory: EmployeeDirectory;
}

/** --verbose wins over LOG_LEVEL */
export function workspaceLogLevel(options: WorkspaceOptions, config: AppConfig): LogLevelName {
  return options.verbose ? "debug" : config.logLevel;
}

/**
 * Resolve the workspace, load .env and open the employee directory,
 * bootstrapping it with sample data on first use.
 */
function openWorkspace(options: WorkspaceOptions): Workspace {
  const root = resolveRoot(options);
  loadEnvFile(envFilePath(root));
  const config = loadConfig();
  setLogLevel(workspaceLogLevel(options, config));

  const directory = new EmployeeDirectory(databasePath(root));
  if (!directory.isInitialized()) {
    const seeded = directory.bootstrap({ role: config.role });
    clack.log.step(`Employee directory created with ${seeded} sample employees`);
  }

  logger.cli.info("Workspace opened", { root, role: config.role });
  return { root, config, directory };
}

// ============================================================================
// Onboarding run
// ============================================================================

function printJoiners(joiners: Employee[], role: string, days: number) {
  if (joiners.length === 0) {
    clack.log.warning(`No new ${role}s joined in the last ${days} days.`);
    return;
  }
  clack.note(formatJoinersTable(joiners), `New ${role}s (last ${days} days)`);
}

interface OnboardOptions extends WorkspaceOptions {
  since?: number;
  yes: boolean;
  dryRun: boolean;
}

async function runOnboarding(workspace: Workspace, options: OnboardOptions): Promise<RunSummary | null> {
  const { root, config, directory } = workspace;
  const log = logger.cli;
  const joinedSinceDays = options.since ?? config.joinedSinceDays;

  if (!options.yes && !options.dryRun) {
    const confirmed = await clack.confirm({
      message: `Onboard new ${config.role}s who joined in the last ${joinedSinceDays} days?`,
    });
    if (clack.isCancel(confirmed) || !confirmed) {
      log.info("Run cancelled by user");
      clack.outro("Run cancelled.");
      return null;
    }
  }

  const model = await createChatModel(config.chatModel);
  const graph = buildOnboardingGraph({
    services: createLiveServices({
      config,
      directory,
      model,
      google: {
        credentialsPath: googleCredentialsPath(root),
        tokenPath: googleTokenPath(root),
      },
    }),
    settings: {
      workspaceGid: config.asana.workspaceGid,
      projectGid: config.asana.projectGid,
      timezone: config.timezone,
    },
  });

  clack.log.step("Fetching new joiners...");
  const runStart = performance.now();
  const summary = await runOnboardingForNewJoiners(directory, graph, {
    role: config.role,
    joinedSinceDays,
    dryRun: options.dryRun,
    onProgress: renderRunEvent,
  });
  const durationMs = Math.round(performance.now() - runStart);
  log.info("Onboarding run finished", { ...summary, durationMs });

  if (summary.message) {
    clack.outro(summary.message);
    return summary;
  }

  clack.note(formatRunSummary(summary), "Workflow completed");
  if (summary.failures.length > 0) {
    process.exitCode = 1;
    clack.outro(`${summary.successes}/${summary.processed} onboarded, ${summary.failures.length} failed`);
  } else {
    clack.outro(`All ${summary.successes} new joiners onboarded (${(durationMs / 1000).toFixed(1)}s)`);
  }
  return summary;
}

// ============================================================================
// Program
// ============================================================================

export function createProgram(): Command {
  const program = new Command();

  // Subcommands declare their own --dir and --verbose
  program
    .name("onboardia")
    .description("AI-powered HR onboarding assistant")
    .version(VERSION)
    .enablePositionalOptions();

  program
    .command("init")
    .description("Interactive workspace setup (API keys, Google client, sample directory)")
    .action(guarded(async () => {
      await runInit();
    }));

  program
    .command("auth")
    .description("Connect Google Calendar (one-time OAuth consent)")
    .option("--dir <path>", "Explicit workspace root (skips auto-discovery)")
    .action(guarded(async (options: WorkspaceOptions) => {
      const root = resolveRoot(options);
      const client = createOAuthClient(googleCredentialsPath(root));

      clack.intro("Google authorization");
      clack.note(generateConsentUrl(client), "Open this URL and approve access");

      const pasted = await clack.text({
        message: "Paste the URL you were redirected to (or just the code)",
        validate: (v) => (!v ? "The redirect URL or code is required" : undefined),
      });
      if (clack.isCancel(pasted)) {
        clack.outro("Authorization cancelled.");
        return;
      }

      await exchangeAuthCode(client, extractAuthCode(pasted), googleTokenPath(root));
      clack.outro("Google Calendar connected.");
    }));

  program
    .command("seed")
    .description("Drop and recreate the employee directory with sample data")
    .option("--dir <path>", "Explicit workspace root (skips auto-discovery)")
    .option("--role <name>", "Role of the sample new joiners and mentors")
    .action(guarded(async (options: WorkspaceOptions & { role?: string }) => {
      const root = resolveRoot(options);
      loadEnvFile(envFilePath(root));
      const role = options.role ?? process.env.ONBOARDING_ROLE ?? "Data Engineer";

      const directory = new EmployeeDirectory(databasePath(root));
      try {
        const seeded = directory.bootstrap({ role });
        clack.log.success(`Seeded ${seeded} employees (role: ${role})`);
      } finally {
        directory.close();
      }
    }));

  program
    .command("joiners")
    .description("List new joiners the onboarding workflow would pick up")
    .option("--dir <path>", "Explicit workspace root (skips auto-discovery)")
    .option("--since <days>", "Look-back window in days", parsePositiveInt)
    .option("--verbose", "Show detailed logging", false)
    .action(guarded(async (options: WorkspaceOptions & { since?: number }) => {
      const { config, directory } = openWorkspace(options);
      try {
        const joinedSinceDays = options.since ?? config.joinedSinceDays;
        const joiners = directory.findNewJoiners({ role: config.role, joinedSinceDays });
        printJoiners(joiners, config.role, joinedSinceDays);
      } finally {
        directory.close();
      }
    }));

  program
    .command("onboard")
    .description("Run the onboarding workflow for new joiners")
    .option("--dir <path>", "Explicit workspace root (skips auto-discovery)")
    .option("--since <days>", "Look-back window in days (default: JOINED_SINCE_DAYS or 14)", parsePositiveInt)
    .option("--yes", "Skip confirmation prompt and run immediately", false)
    .option("--dry-run", "List new joiners without contacting any service", false)
    .option("--verbose", "Show detailed logging", false)
    .action(guarded(async (options: OnboardOptions) => {
      clack.intro(`onboardia v${VERSION}`);
      const workspace = openWorkspace(options);
      try {
        await runOnboarding(workspace, options);
      } finally {
        workspace.directory.close();
      }
    }));

  program
    .command("chat")
    .description("Chat with the HR assistant")
    .option("--dir <path>", "Explicit workspace root (skips auto-discovery)")
    .option("--verbose", "Show detailed logging", false)
    .action(guarded(async (options: WorkspaceOptions) => {
      clack.intro(`onboardia v${VERSION}`);
      const { config, directory } = openWorkspace(options);
      directory.close();
      await runChat(await createChatModel(config.chatModel));
    }));

  // No subcommand: pick a mode
  program
    .option("--dir <path>", "Explicit workspace root (skips auto-discovery)")
    .option("--verbose", "Show detailed logging", false)
    .action(guarded(async (options: WorkspaceOptions) => {
      clack.intro(`onboardia v${VERSION} - your AI-powered HR onboarding assistant`);
      const workspace = openWorkspace(options);

      try {
        const mode = await clack.select({
          message: "What would you like to do?",
          options: [
            { value: "onboard", label: "Run Onboarding Workflow" },
            { value: "chat", label: "Chat with Onboardia" },
          ],
        });
        if (clack.isCancel(mode)) {
          clack.outro("Bye!");
          return;
        }

        if (mode === "onboard") {
          await runOnboarding(workspace, { ...options, yes: false, dryRun: false });
        } else {
          await runChat(await createChatModel(workspace.config.chatModel));
        }
      } finally {
        workspace.directory.close();
      }
    }));

  return program;
}
