import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, realpathSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { databasePath, envFilePath, findWorkspaceRoot, googleTokenPath } from "@/cli/workspace";

describe("findWorkspaceRoot", () => {
  let root: string;

  beforeEach(() => {
    root = realpathSync(mkdtempSync(join(tmpdir(), "onboardia-ws-")));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("finds the workspace from a nested directory", () => {
    mkdirSync(join(root, ".onboardia"));
    const nested = join(root, "reports", "2025");
    mkdirSync(nested, { recursive: true });

    expect(findWorkspaceRoot(nested)).toBe(root);
  });

  it("returns null when no ancestor is a workspace", () => {
    expect(findWorkspaceRoot(root)).toBeNull();
  });
});

describe("workspace paths", () => {
  it("keeps data under .onboardia and .env at the root", () => {
    expect(databasePath("/srv/hr")).toBe("/srv/hr/.onboardia/employees.db");
    expect(googleTokenPath("/srv/hr")).toBe("/srv/hr/.onboardia/token.json");
    expect(envFilePath("/srv/hr")).toBe("/srv/hr/.env");
  });
});
