import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { buildOnboardingGraph, type OnboardingServices } from "@/agents/onboarding";
import { runOnboardingForNewJoiners, type RunEvent } from "@/agents/runner";
import { EmployeeDirectory } from "@/services/directory";

const TODAY = new Date(2025, 7, 14, 9, 0, 0);
const ROLE = "Data Engineer";

describe("runOnboardingForNewJoiners", () => {
  let directory: EmployeeDirectory;
  let services: OnboardingServices;

  beforeEach(() => {
    directory = new EmployeeDirectory(":memory:");
    directory.bootstrap({ role: ROLE, today: TODAY });
    directory.addEmployee({
      name: "Arjun Kapoor",
      email: "arjun.kapoor@example.com",
      role: ROLE,
      department: "Data Platform",
      date_joined: "2025-08-11",
      location: "Chennai",
      level: "junior",
    });

    services = {
      composeWelcomeEmail: async (employee) => `<p>Welcome ${employee.name}</p>`,
      sendEmail: async (message) =>
        message.to === "arjun.kapoor@example.com"
          ? { success: false, email: message.to, error: "Mailbox unavailable" }
          : { success: true, email: message.to, messageId: "<id@example.com>" },
      createOnboardingTask: async (input) => ({ gid: "9001", name: input.taskName }),
      findMentor: (employee) =>
        directory.findSeniorMentor({ role: employee.role, preferredLocation: employee.location }),
      scheduleEvent: async () => ({ id: "evt-1" }),
    };
  });

  afterEach(() => {
    directory.close();
  });

  const graphFor = (s: OnboardingServices) =>
    buildOnboardingGraph({
      services: s,
      settings: { workspaceGid: "111", projectGid: "222", timezone: "Asia/Kolkata" },
      now: () => TODAY,
    });

  it("onboards each new joiner and collects failures", async () => {
    const summary = await runOnboardingForNewJoiners(directory, graphFor(services), {
      role: ROLE,
      joinedSinceDays: 14,
      today: TODAY,
    });

    expect(summary.processed).toBe(2);
    expect(summary.successes).toBe(1);
    expect(summary.failures).toHaveLength(1);
    expect(summary.failures[0].startsWith("arjun.kapoor@example.com: ")).toBe(true);
    expect(summary.failures[0]).toContain("Welcome email to arjun.kapoor@example.com failed: Mailbox unavailable");
    expect(summary.message).toBeUndefined();
  });

  it("reports progress for the joiners, the start and each employee", async () => {
    const events: RunEvent[] = [];

    await runOnboardingForNewJoiners(directory, graphFor(services), {
      role: ROLE,
      joinedSinceDays: 14,
      today: TODAY,
      onProgress: (event) => events.push(event),
    });

    expect(events.map((e) => e.type)).toEqual([
      "joiners",
      "start",
      "employee-start",
      "employee-done",
      "employee-start",
      "employee-failed",
    ]);

    const joinersEvent = events[0];
    if (joinersEvent.type !== "joiners") throw new Error("expected joiners event first");
    expect(joinersEvent.joiners.map((e) => e.name)).toEqual(["Priya Menon", "Arjun Kapoor"]);
    expect(joinersEvent.steps).toEqual([
      "Generate welcome email",
      "Send welcome email",
      "Create Asana task",
      "Find mentor",
      "Schedule intro call with mentor",
    ]);

    const done = events[3];
    if (done.type !== "employee-done") throw new Error("expected employee-done");
    expect(done.state.mentor.email).toBe("anita.desai@example.com");
    expect(done.state.logs).toHaveLength(5);
  });

  it("returns a message when there is nobody to onboard", async () => {
    const composeWelcomeEmail = vi.fn(services.composeWelcomeEmail);

    const summary = await runOnboardingForNewJoiners(
      directory,
      graphFor({ ...services, composeWelcomeEmail }),
      { role: "Security Engineer", joinedSinceDays: 14, today: TODAY }
    );

    expect(summary).toEqual({
      processed: 0,
      successes: 0,
      failures: [],
      message: "No new Security Engineers found",
    });
    expect(composeWelcomeEmail).not.toHaveBeenCalled();
  });

  it("lists joiners without running the workflow in dry-run mode", async () => {
    const composeWelcomeEmail = vi.fn(services.composeWelcomeEmail);
    const events: RunEvent[] = [];

    const summary = await runOnboardingForNewJoiners(
      directory,
      graphFor({ ...services, composeWelcomeEmail }),
      {
        role: ROLE,
        joinedSinceDays: 14,
        today: TODAY,
        dryRun: true,
        onProgress: (event) => events.push(event),
      }
    );

    expect(summary).toEqual({
      processed: 0,
      successes: 0,
      failures: [],
      message: "Dry run: 2 new Data Engineer(s) found",
    });
    expect(events.map((e) => e.type)).toEqual(["joiners"]);
    expect(composeWelcomeEmail).not.toHaveBeenCalled();
  });

  it("keeps going after a failure", async () => {
    const failing: OnboardingServices = {
      ...services,
      findMentor: () => null,
    };

    const summary = await runOnboardingForNewJoiners(directory, graphFor(failing), {
      role: ROLE,
      joinedSinceDays: 14,
      today: TODAY,
    });

    expect(summary.processed).toBe(2);
    expect(summary.successes).toBe(0);
    expect(summary.failures).toHaveLength(2);
    expect(summary.failures[0]).toContain("No senior mentor available for Priya Menon");
  });
});
