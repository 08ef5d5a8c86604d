/**
 * Onboarding assistant agents
 *
 * - Onboarding workflow: LangGraph StateGraph run once per new joiner
 * - Runner: finds new joiners and drives the workflow
 * - Chat: free-form HR assistant
 */

export {
  buildOnboardingGraph,
  OnboardingState,
  ONBOARDING_STEPS,
  introCallSummary,
  introCallDescription,
  onboardingTaskName,
  type OnboardingGraph,
  type OnboardingGraphConfig,
  type OnboardingServices,
  type OnboardingSettings,
  type OnboardingStateType,
} from "./onboarding";

export { runOnboardingForNewJoiners, type RunEvent, type RunOptions, type JoinerSource } from "./runner";
export { ChatSession, isStopCommand, STOP_COMMANDS, STOP_REPLY, type ChatReply } from "./chat";
export { generateWelcomeEmail, cleanHtmlOutput, welcomeSubject, type EmailContext } from "./welcome-email";
export { createChatModel, DEFAULT_TEMPERATURE } from "./model";
