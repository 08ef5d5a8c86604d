/**
 * Onboarding run: load new joiners and run the workflow graph for each
 */

import type { Employee, RunSummary } from "@/core/types";
import { errorMessage } from "@/core/errors";
import type { NewJoinerQuery } from "@/services/directory";
import { ONBOARDING_STEPS, type OnboardingGraph, type OnboardingStateType } from "./onboarding";
import { logger } from "@/utils/logger";

const log = logger.onboarding;

export type RunEvent =
  | { type: "joiners"; joiners: Employee[]; role: string; joinedSinceDays: number; steps: readonly string[] }
  | { type: "start" }
  | { type: "employee-start"; employee: Employee; index: number; total: number }
  | { type: "employee-done"; employee: Employee; state: OnboardingStateType }
  | { type: "employee-failed"; employee: Employee; error: string };

export interface JoinerSource {
  findNewJoiners(query: NewJoinerQuery): Employee[];
}

export interface RunOptions {
  role: string;
  joinedSinceDays: number;
  today?: Date;
  /** List the joiners without running the workflow */
  dryRun?: boolean;
  onProgress?: (event: RunEvent) => void;
}

export async function runOnboardingForNewJoiners(
  directory: JoinerSource,
  graph: OnboardingGraph,
  options: RunOptions,
): Promise<RunSummary> {
  const { role, joinedSinceDays, today, dryRun = false, onProgress } = options;

  const joiners = directory.findNewJoiners({ role, joinedSinceDays, today });
  if (joiners.length === 0) {
    log.info("No new joiners", { role, joinedSinceDays });
    return { processed: 0, successes: 0, failures: [], message: `No new ${role}s found` };
  }

  onProgress?.({ type: "joiners", joiners, role, joinedSinceDays, steps: ONBOARDING_STEPS });

  if (dryRun) {
    log.info("Dry run, skipping workflow", { count: joiners.length });
    return { processed: 0, successes: 0, failures: [], message: `Dry run: ${joiners.length} new ${role}(s) found` };
  }

  onProgress?.({ type: "start" });

  let successes = 0;
  const failures: string[] = [];

  for (const [index, employee] of joiners.entries()) {
    onProgress?.({ type: "employee-start", employee, index, total: joiners.length });
    const start = performance.now();

    try {
      const state = await graph.invoke({ employee, logs: [] });
      successes++;
      log.info("Employee onboarded", {
        email: employee.email,
        durationMs: Math.round(performance.now() - start),
      });
      onProgress?.({ type: "employee-done", employee, state });
    } catch (error) {
      const msg = errorMessage(error);
      failures.push(`${employee.email}: ${msg}`);
      log.error("Employee onboarding failed", { email: employee.email, error: msg });
      onProgress?.({ type: "employee-failed", employee, error: msg });
    }
  }

  return {
    processed: joiners.length,
    successes,
    failures,
  };
}
