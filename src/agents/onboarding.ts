/**
 * Per-employee onboarding workflow
 *
 * A linear LangGraph StateGraph:
 *   generate_email → send_email → asana_task → find_mentor → schedule_intro_call
 *
 * Any node error aborts the employee's run; the runner records the failure.
 */

import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import type {
  AsanaTask,
  CalendarEventResult,
  EmailResult,
  Employee,
  Reminder,
} from "@/core/types";
import type { EmailMessage } from "@/services/gmail";
import type { OnboardingTaskInput } from "@/services/asana";
import type { EventRequest } from "@/services/calendar";
import { nextWeekSlot, toLocalIsoSeconds } from "@/utils/dates";
import { welcomeSubject } from "./welcome-email";
import { logger } from "@/utils/logger";

const log = logger.onboarding;

// ============================================================================
// State
// ============================================================================

export const OnboardingState = Annotation.Root({
  employee: Annotation<Employee>,
  emailBody: Annotation<string>,
  emailResult: Annotation<EmailResult>,
  asanaTask: Annotation<AsanaTask>,
  mentor: Annotation<Employee>,
  calendarEvent: Annotation<CalendarEventResult>,
  logs: Annotation<string[]>({
    reducer: (current, update) => current.concat(update),
    default: () => [],
  }),
});

export type OnboardingStateType = typeof OnboardingState.State;
type OnboardingUpdate = typeof OnboardingState.Update;

// ============================================================================
// Dependencies
// ============================================================================

/**
 * Side effects the workflow performs, injected so the graph can run against fakes
 */
export interface OnboardingServices {
  composeWelcomeEmail(employee: Employee): Promise<string>;
  sendEmail(message: EmailMessage): Promise<EmailResult>;
  createOnboardingTask(input: OnboardingTaskInput): Promise<AsanaTask>;
  findMentor(employee: Employee): Employee | null | Promise<Employee | null>;
  scheduleEvent(request: EventRequest): Promise<CalendarEventResult>;
}

export interface OnboardingSettings {
  workspaceGid: string;
  projectGid: string;
  timezone: string;
  /** Hour (local, in `timezone`) the intro call starts */
  introCallHour?: number;
  introCallReminders?: Reminder[];
}

export interface OnboardingGraphConfig {
  services: OnboardingServices;
  settings: OnboardingSettings;
  now?: () => Date;
}

export const ONBOARDING_STEPS = [
  "Generate welcome email",
  "Send welcome email",
  "Create Asana task",
  "Find mentor",
  "Schedule intro call with mentor",
] as const;

// ============================================================================
// Helpers
// ============================================================================

export function introCallSummary(employee: Employee, mentor: Employee): string {
  return `Intro chat: ${employee.name} x ${mentor.name} (${employee.department})`;
}

export function introCallDescription(employee: Employee, mentor: Employee): string {
  return [
    `Welcome ${employee.name}.`,
    `Mentor: ${mentor.name} (${mentor.email}).`,
    "Agenda: Meet the team, tooling overview, first week goals.",
    `Manager: ${employee.manager_email || "N/A"}.`,
    "",
  ].join("\n");
}

export function onboardingTaskName(employee: Employee): string {
  return `Onboarding for ${employee.name} - ${employee.role}`;
}

// ============================================================================
// Graph
// ============================================================================

export function buildOnboardingGraph({ services, settings, now = () => new Date() }: OnboardingGraphConfig) {
  const introHour = settings.introCallHour ?? 10;
  const reminders: Reminder[] = settings.introCallReminders ?? [{ method: "popup", minutes: 30 }];

  const logEntry = (message: string): string[] => {
    log.info(message);
    return [`${toLocalIsoSeconds(now())} | ${message}`];
  };

  const generateEmail = async (state: OnboardingStateType): Promise<OnboardingUpdate> => {
    const { employee } = state;
    const body = await services.composeWelcomeEmail(employee);
    return {
      emailBody: body,
      logs: logEntry(`Generated email for ${employee.email}`),
    };
  };

  const sendEmail = async (state: OnboardingStateType): Promise<OnboardingUpdate> => {
    const { employee } = state;
    const result = await services.sendEmail({
      to: employee.email,
      toName: employee.name,
      subject: welcomeSubject(employee),
      htmlBody: state.emailBody,
    });
    if (!result.success) {
      throw new Error(`Welcome email to ${employee.email} failed: ${result.error ?? "unknown error"}`);
    }
    return {
      emailResult: result,
      logs: logEntry(`Sent welcome email to ${employee.email}`),
    };
  };

  const asanaTask = async (state: OnboardingStateType): Promise<OnboardingUpdate> => {
    const { employee } = state;
    const task = await services.createOnboardingTask({
      workspaceGid: settings.workspaceGid,
      projectGid: settings.projectGid,
      newMemberEmail: employee.email,
      taskName: onboardingTaskName(employee),
    });
    return {
      asanaTask: task,
      logs: logEntry(`Created Asana task for ${employee.email}`),
    };
  };

  const findMentor = async (state: OnboardingStateType): Promise<OnboardingUpdate> => {
    const { employee } = state;
    const mentor = await services.findMentor(employee);
    if (!mentor) {
      throw new Error(`No senior mentor available for ${employee.name}`);
    }
    return {
      mentor,
      logs: logEntry(`Selected mentor ${mentor.name} for ${employee.email}`),
    };
  };

  const scheduleIntroCall = async (state: OnboardingStateType): Promise<OnboardingUpdate> => {
    const { employee, mentor } = state;
    const slot = nextWeekSlot(now(), introHour, 1, settings.timezone);

    const event = await services.scheduleEvent({
      summary: introCallSummary(employee, mentor),
      location: "Google Meet",
      description: introCallDescription(employee, mentor),
      startTime: slot.start,
      endTime: slot.end,
      attendees: [employee.email, mentor.email],
      timezone: settings.timezone,
      reminders,
      conferenceRequestId: `mentor-${employee.id}-${slot.date}`,
    });
    return {
      calendarEvent: event,
      logs: logEntry(`Scheduled mentor call for ${employee.email}`),
    };
  };

  return new StateGraph(OnboardingState)
    .addNode("generate_email", generateEmail)
    .addNode("send_email", sendEmail)
    .addNode("asana_task", asanaTask)
    .addNode("find_mentor", findMentor)
    .addNode("schedule_intro_call", scheduleIntroCall)
    .addEdge(START, "generate_email")
    .addEdge("generate_email", "send_email")
    .addEdge("send_email", "asana_task")
    .addEdge("asana_task", "find_mentor")
    .addEdge("find_mentor", "schedule_intro_call")
    .addEdge("schedule_intro_call", END)
    .compile();
}

export type OnboardingGraph = ReturnType<typeof buildOnboardingGraph>;
