/**
 * Terminal rendering for onboarding runs
 */

import * as clack from "@clack/prompts";
import type { RunEvent } from "@/agents/runner";
import type { Employee, RunSummary } from "@/core/types";

/** Aligned name / email / start date / location rows */
export function formatJoinersTable(joiners: Employee[]): string {
  const maxName = Math.max(...joiners.map((e) => e.name.length), 4);
  const maxEmail = Math.max(...joiners.map((e) => e.email.length), 5);

  return joiners
    .map((e) => {
      const name = e.name.padEnd(maxName + 2);
      const email = e.email.padEnd(maxEmail + 2);
      return `${name}${email}${e.date_joined}  ${e.location}`;
    })
    .join("\n");
}

export function formatRunSummary(summary: RunSummary): string {
  const lines = [
    `Processed: ${summary.processed}`,
    `Succeeded: ${summary.successes}`,
    `Failed: ${summary.failures.length}`,
  ];
  if (summary.failures.length > 0) {
    lines.push("", "Failures:", ...summary.failures.map((f) => `  ${f}`));
  }
  return lines.join("\n");
}

export function renderRunEvent(event: RunEvent) {
  switch (event.type) {
    case "joiners": {
      const count = event.joiners.length;
      clack.log.info(
        `Found ${count} new ${event.role}${count === 1 ? "" : "s"} who joined in the last ${event.joinedSinceDays} days.`
      );
      clack.note(formatJoinersTable(event.joiners), "New joiners");
      clack.note(event.steps.map((step) => `- ${step}`).join("\n"), "Onboarding steps");
      break;
    }
    case "start":
      clack.log.step("Starting onboarding workflow...");
      break;
    case "employee-start":
      clack.log.step(`[${event.index + 1}/${event.total}] ${event.employee.name} <${event.employee.email}>`);
      break;
    case "employee-done": {
      const { state } = event;
      const lines = [...state.logs];
      if (state.asanaTask?.permalink_url) lines.push(`Asana: ${state.asanaTask.permalink_url}`);
      if (state.calendarEvent?.hangoutLink) lines.push(`Meet: ${state.calendarEvent.hangoutLink}`);
      clack.log.success(lines.join("\n"));
      break;
    }
    case "employee-failed":
      clack.log.error(`${event.employee.email}: ${event.error}`);
      break;
  }
}
