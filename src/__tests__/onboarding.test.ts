import { describe, it, expect, vi } from "vitest";
import {
  buildOnboardingGraph,
  introCallDescription,
  introCallSummary,
  onboardingTaskName,
} from "@/agents/onboarding";
import type { EmailResult, Employee } from "@/core/types";
import type { EmailMessage } from "@/services/gmail";
import { makeEmployee, makeMentor } from "./fixtures";

const NOW = new Date(2025, 7, 14, 9, 15, 0);

const SETTINGS = {
  workspaceGid: "111",
  projectGid: "222",
  timezone: "Asia/Kolkata",
};

function fakeServices() {
  return {
    composeWelcomeEmail: vi.fn(async (_employee: Employee) => "<h1>Welcome</h1>"),
    sendEmail: vi.fn(async (_message: EmailMessage): Promise<EmailResult> => ({
      success: true,
      messageId: "<msg-1@example.com>",
      email: "priya.menon@example.com",
    })),
    createOnboardingTask: vi.fn(async () => ({
      gid: "9001",
      name: "Onboarding for Priya Menon - Data Engineer",
      permalink_url: "https://app.asana.com/0/222/9001",
    })),
    findMentor: vi.fn((_employee: Employee): Employee | null => makeMentor()),
    scheduleEvent: vi.fn(async () => ({ id: "evt-1", hangoutLink: "https://meet.google.com/abc-defg-hij" })),
  };
}

describe("onboarding helpers", () => {
  it("names the Asana task after the hire and role", () => {
    expect(onboardingTaskName(makeEmployee())).toBe("Onboarding for Priya Menon - Data Engineer");
  });

  it("builds the intro call summary and description", () => {
    const employee = makeEmployee();
    const mentor = makeMentor();

    expect(introCallSummary(employee, mentor)).toBe("Intro chat: Priya Menon x Anita Desai (Data Platform)");
    expect(introCallDescription(employee, mentor)).toBe(
      "Welcome Priya Menon.\n" +
        "Mentor: Anita Desai (anita.desai@example.com).\n" +
        "Agenda: Meet the team, tooling overview, first week goals.\n" +
        "Manager: lead.de@example.com.\n"
    );
  });

  it("writes N/A when the hire has no manager", () => {
    const description = introCallDescription(makeEmployee({ manager_email: null }), makeMentor());
    expect(description).toContain("Manager: N/A.");
  });
});

describe("buildOnboardingGraph", () => {
  it("runs all five steps in order", async () => {
    const services = fakeServices();
    const graph = buildOnboardingGraph({ services, settings: SETTINGS, now: () => NOW });

    await graph.invoke({ employee: makeEmployee() });

    const order = [
      services.composeWelcomeEmail,
      services.sendEmail,
      services.createOnboardingTask,
      services.findMentor,
      services.scheduleEvent,
    ].map((fn) => fn.mock.invocationCallOrder[0]);
    expect(order).toEqual([...order].sort((a, b) => a - b));
    expect(order.every((n) => n > 0)).toBe(true);
  });

  it("accumulates one timestamped log line per step", async () => {
    const graph = buildOnboardingGraph({ services: fakeServices(), settings: SETTINGS, now: () => NOW });

    const state = await graph.invoke({ employee: makeEmployee() });

    expect(state.logs).toEqual([
      "2025-08-14T09:15:00 | Generated email for priya.menon@example.com",
      "2025-08-14T09:15:00 | Sent welcome email to priya.menon@example.com",
      "2025-08-14T09:15:00 | Created Asana task for priya.menon@example.com",
      "2025-08-14T09:15:00 | Selected mentor Anita Desai for priya.menon@example.com",
      "2025-08-14T09:15:00 | Scheduled mentor call for priya.menon@example.com",
    ]);
    expect(state.emailBody).toBe("<h1>Welcome</h1>");
    expect(state.emailResult.messageId).toBe("<msg-1@example.com>");
    expect(state.asanaTask.gid).toBe("9001");
    expect(state.mentor.email).toBe("anita.desai@example.com");
    expect(state.calendarEvent.id).toBe("evt-1");
  });

  it("sends the generated email with the welcome subject", async () => {
    const services = fakeServices();
    const graph = buildOnboardingGraph({ services, settings: SETTINGS, now: () => NOW });

    await graph.invoke({ employee: makeEmployee() });

    expect(services.sendEmail).toHaveBeenCalledWith({
      to: "priya.menon@example.com",
      toName: "Priya Menon",
      subject: "Welcome to the team, Priya Menon!",
      htmlBody: "<h1>Welcome</h1>",
    });
  });

  it("creates the Asana task in the configured workspace and project", async () => {
    const services = fakeServices();
    const graph = buildOnboardingGraph({ services, settings: SETTINGS, now: () => NOW });

    await graph.invoke({ employee: makeEmployee() });

    expect(services.createOnboardingTask).toHaveBeenCalledWith({
      workspaceGid: "111",
      projectGid: "222",
      newMemberEmail: "priya.menon@example.com",
      taskName: "Onboarding for Priya Menon - Data Engineer",
    });
  });

  it("schedules the intro call for the same weekday next week", async () => {
    const services = fakeServices();
    const graph = buildOnboardingGraph({ services, settings: SETTINGS, now: () => NOW });

    await graph.invoke({ employee: makeEmployee() });

    expect(services.scheduleEvent).toHaveBeenCalledWith({
      summary: "Intro chat: Priya Menon x Anita Desai (Data Platform)",
      location: "Google Meet",
      description:
        "Welcome Priya Menon.\n" +
        "Mentor: Anita Desai (anita.desai@example.com).\n" +
        "Agenda: Meet the team, tooling overview, first week goals.\n" +
        "Manager: lead.de@example.com.\n",
      startTime: "2025-08-21T10:00:00",
      endTime: "2025-08-21T11:00:00",
      attendees: ["priya.menon@example.com", "anita.desai@example.com"],
      timezone: "Asia/Kolkata",
      reminders: [{ method: "popup", minutes: 30 }],
      conferenceRequestId: "mentor-1-2025-08-21",
    });
  });

  it("honors a custom intro call hour", async () => {
    const services = fakeServices();
    const graph = buildOnboardingGraph({
      services,
      settings: { ...SETTINGS, introCallHour: 15 },
      now: () => NOW,
    });

    await graph.invoke({ employee: makeEmployee() });

    expect(services.scheduleEvent).toHaveBeenCalledWith(
      expect.objectContaining({ startTime: "2025-08-21T15:00:00", endTime: "2025-08-21T16:00:00" })
    );
  });

  it("takes the intro call date from the configured time zone", async () => {
    const services = fakeServices();
    // 19:00 UTC on the 14th is past midnight in Kolkata
    const graph = buildOnboardingGraph({
      services,
      settings: SETTINGS,
      now: () => new Date(Date.UTC(2025, 7, 14, 19, 0)),
    });

    await graph.invoke({ employee: makeEmployee() });

    expect(services.scheduleEvent).toHaveBeenCalledWith(
      expect.objectContaining({
        startTime: "2025-08-22T10:00:00",
        endTime: "2025-08-22T11:00:00",
        conferenceRequestId: "mentor-1-2025-08-22",
      })
    );
  });

  it("stops when the welcome email cannot be sent", async () => {
    const services = fakeServices();
    services.sendEmail.mockResolvedValueOnce({
      success: false,
      email: "priya.menon@example.com",
      error: "Invalid login",
    });
    const graph = buildOnboardingGraph({ services, settings: SETTINGS, now: () => NOW });

    await expect(graph.invoke({ employee: makeEmployee() })).rejects.toThrow(
      "Welcome email to priya.menon@example.com failed: Invalid login"
    );
    expect(services.createOnboardingTask).not.toHaveBeenCalled();
  });

  it("fails when no mentor is available", async () => {
    const services = fakeServices();
    services.findMentor.mockReturnValueOnce(null);
    const graph = buildOnboardingGraph({ services, settings: SETTINGS, now: () => NOW });

    await expect(graph.invoke({ employee: makeEmployee() })).rejects.toThrow(
      "No senior mentor available for Priya Menon"
    );
    expect(services.scheduleEvent).not.toHaveBeenCalled();
  });
});
