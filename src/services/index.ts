/**
 * Live service wiring for the onboarding workflow
 */

import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { AppConfig } from "@/core/config";
import type { OnboardingServices } from "@/agents/onboarding";
import { generateWelcomeEmail } from "@/agents/welcome-email";
import { AsanaClient } from "./asana";
import { CalendarClient } from "./calendar";
import type { EmployeeDirectory } from "./directory";
import { GmailSender } from "./gmail";
import { getAuthorizedClient, type GoogleAuthPaths } from "./google-auth";

export { EmployeeDirectory } from "./directory";
export { GmailSender } from "./gmail";
export { AsanaClient } from "./asana";
export { CalendarClient, buildEventBody } from "./calendar";

export interface LiveServicesOptions {
  config: AppConfig;
  directory: EmployeeDirectory;
  model: BaseChatModel;
  google: GoogleAuthPaths;
}

export function createLiveServices({ config, directory, model, google }: LiveServicesOptions): OnboardingServices {
  const gmail = new GmailSender(config.gmail);
  const asana = new AsanaClient(config.asana.pat);
  // Calendar auth is resolved on first use so a missing token only fails that step
  let calendar: CalendarClient | null = null;

  return {
    composeWelcomeEmail: (employee) =>
      generateWelcomeEmail(model, employee, {
        companyName: config.companyName,
        hrFallbackEmail: config.hrFallbackEmail,
      }),
    sendEmail: (message) => gmail.send(message),
    createOnboardingTask: (input) => asana.createOnboardingTask(input),
    findMentor: (employee) =>
      directory.findSeniorMentor({ role: employee.role, preferredLocation: employee.location }),
    scheduleEvent: async (request) => {
      calendar ??= new CalendarClient(getAuthorizedClient(google));
      return calendar.scheduleEvent(request);
    },
  };
}
