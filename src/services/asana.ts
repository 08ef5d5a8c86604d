/**
 * Asana REST client (https://app.asana.com/api/1.0)
 *
 * Adds new hires to the workspace and creates their onboarding task.
 */

import type { AsanaTask } from "@/core/types";
import { IntegrationError, errorMessage } from "@/core/errors";
import { logger } from "@/utils/logger";

const log = logger.asana;

const ASANA_BASE_URL = "https://app.asana.com/api/1.0";

const USER_OPT_FIELDS = "email,name";
const TASK_OPT_FIELDS =
  "name,assignee,assignee.name,projects,projects.name,workspace,workspace.name,created_at,permalink_url";

export interface AsanaUser {
  gid: string;
  email?: string;
  name?: string;
}

export interface CreateTaskInput {
  workspaceGid: string;
  projectGid: string;
  assignee: string;
  name: string;
  notes?: string;
}

export interface OnboardingTaskInput {
  workspaceGid: string;
  projectGid: string;
  newMemberEmail: string;
  taskName: string;
}

/**
 * Builds a URL for the Asana API.
 * @param path - The path to the API endpoint.
 * @param params - Query parameters; empty values are skipped.
 */
function buildAsanaUrl(path: string, params: Record<string, string | undefined> = {}) {
  const url = new URL(`${ASANA_BASE_URL}${path}`);
  Object.entries(params).forEach(([key, value]) => {
    if (value !== undefined && value !== "") {
      url.searchParams.set(key, value);
    }
  });
  return url.toString();
}

/**
 * Parses an Asana error response ({ errors: [{ message, help }] }).
 */
async function parseAsanaError(response: Response): Promise<string> {
  const text = await response.text();
  try {
    const data: unknown = JSON.parse(text);
    if (typeof data === "object" && data !== null && "errors" in data && Array.isArray(data.errors)) {
      return data.errors
        .map((err: { message?: string; help?: string }) => err.message ?? err.help ?? "")
        .filter(Boolean)
        .join("; ");
    }
    return text;
  } catch {
    return text;
  }
}

function isObjectWithData(value: unknown): value is { data: Record<string, unknown> } {
  return (
    typeof value === "object" &&
    value !== null &&
    "data" in value &&
    typeof value.data === "object" &&
    value.data !== null
  );
}

export class AsanaClient {
  constructor(
    private readonly accessToken: string,
    private readonly fetchImpl: typeof fetch = (...args) => fetch(...args),
  ) {}

  /**
   * POST a JSON body and return the `data` envelope of the response.
   */
  private async post(
    operation: string,
    path: string,
    body: Record<string, unknown>,
    optFields: string,
  ): Promise<Record<string, unknown>> {
    const url = buildAsanaUrl(path, { opt_fields: optFields });
    log.debug("Asana API request", { endpoint: path });

    const start = performance.now();
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify({ data: body }),
      });
    } catch (error) {
      throw new IntegrationError("asana", operation, errorMessage(error));
    }

    log.debug("Asana API response", {
      endpoint: path,
      status: response.status,
      durationMs: Math.round(performance.now() - start),
    });

    if (!response.ok) {
      const details = await parseAsanaError(response);
      throw new IntegrationError("asana", operation, details, response.status);
    }

    const payload: unknown = await response.json();
    if (!isObjectWithData(payload)) {
      throw new IntegrationError("asana", operation, "Response has no data envelope", response.status);
    }
    return payload.data;
  }

  /**
   * Invites (or adds) a user to a workspace by email.
   */
  async inviteUserToWorkspace(workspaceGid: string, email: string): Promise<AsanaUser> {
    const data = await this.post(
      "workspace invitation",
      `/workspaces/${encodeURIComponent(workspaceGid)}/addUser`,
      { user: email },
      USER_OPT_FIELDS,
    );
    const user: AsanaUser = {
      gid: String(data.gid),
      email: typeof data.email === "string" ? data.email : undefined,
      name: typeof data.name === "string" ? data.name : undefined,
    };
    log.info("User added to workspace", { workspaceGid, email, userGid: user.gid });
    return user;
  }

  /**
   * Creates a task in a project, assigned by email.
   */
  async createTask(input: CreateTaskInput): Promise<AsanaTask> {
    const body: Record<string, unknown> = {
      name: input.name,
      assignee: input.assignee,
      workspace: input.workspaceGid,
      projects: [input.projectGid],
    };
    if (input.notes) body.notes = input.notes;

    const data = await this.post("task creation", "/tasks", body, TASK_OPT_FIELDS);
    const task = toAsanaTask(data);
    log.info("Task created", { taskGid: task.gid, name: task.name, url: task.permalink_url });
    return task;
  }

  /**
   * Adds the new member to the workspace, then creates their onboarding task.
   * A failed invitation is logged and skipped (the user may already be a member).
   */
  async createOnboardingTask(input: OnboardingTaskInput): Promise<AsanaTask> {
    try {
      await this.inviteUserToWorkspace(input.workspaceGid, input.newMemberEmail);
    } catch (error) {
      log.warn("Workspace invitation failed, continuing with task creation", {
        email: input.newMemberEmail,
        error: errorMessage(error),
      });
    }

    return this.createTask({
      workspaceGid: input.workspaceGid,
      projectGid: input.projectGid,
      assignee: input.newMemberEmail,
      name: input.taskName,
    });
  }
}

function toAsanaTask(data: Record<string, unknown>): AsanaTask {
  const str = (value: unknown) => (typeof value === "string" ? value : undefined);
  const ref = (value: unknown) => {
    if (typeof value !== "object" || value === null || !("gid" in value)) return undefined;
    return {
      gid: String(value.gid),
      name: "name" in value ? str(value.name) : undefined,
    };
  };

  return {
    gid: String(data.gid),
    name: str(data.name) ?? "",
    permalink_url: str(data.permalink_url),
    created_at: str(data.created_at),
    assignee: ref(data.assignee) ?? null,
    projects: Array.isArray(data.projects)
      ? data.projects.flatMap((p: unknown) => {
          const r = ref(p);
          return r ? [r] : [];
        })
      : undefined,
    workspace: ref(data.workspace),
  };
}
