/**
 * An onboardia workspace is any directory holding a `.onboardia/` folder
 * (employee database, Google OAuth client and token) with `.env` beside it.
 * Commands find it the way git finds `.git/`.
 */

import { existsSync } from "fs";
import { join, dirname } from "path";

export const WORKSPACE_DIR_NAME = ".onboardia";

/**
 * Nearest ancestor of `from` (inclusive) that contains `.onboardia/`,
 * or null once the filesystem root is passed.
 */
export function findWorkspaceRoot(from: string = process.cwd()): string | null {
  for (let dir = from; ; dir = dirname(dir)) {
    if (existsSync(join(dir, WORKSPACE_DIR_NAME))) return dir;
    if (dirname(dir) === dir) return null;
  }
}

// ============================================================================
// Paths
// ============================================================================

export function configDir(root: string): string {
  return join(root, WORKSPACE_DIR_NAME);
}

export const databasePath = (root: string) => join(configDir(root), "employees.db");
export const googleCredentialsPath = (root: string) => join(configDir(root), "credentials.json");
export const googleTokenPath = (root: string) => join(configDir(root), "token.json");
export const envFilePath = (root: string) => join(root, ".env");
