/**
 * Welcome email generation with the chat model
 */

import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { StringOutputParser } from "@langchain/core/output_parsers";
import type { Employee } from "@/core/types";
import { EMAIL_PROMPT } from "./prompts";

export interface EmailContext {
  companyName: string;
  hrFallbackEmail: string;
}

const CODE_FENCE = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/;

/**
 * Trim the model output and drop a surrounding Markdown code fence
 */
export function cleanHtmlOutput(raw: string): string {
  const trimmed = raw.trim();
  const fenced = trimmed.match(CODE_FENCE);
  return fenced ? fenced[1].trim() : trimmed;
}

export function welcomeSubject(employee: Employee): string {
  return `Welcome to the team, ${employee.name}!`;
}

export async function generateWelcomeEmail(
  model: BaseChatModel,
  employee: Employee,
  context: EmailContext,
): Promise<string> {
  const chain = EMAIL_PROMPT.pipe(model).pipe(new StringOutputParser());
  const body = await chain.invoke({
    name: employee.name,
    role: employee.role,
    team: employee.department,
    company: context.companyName,
    start_date: employee.date_joined,
    manager_email: employee.manager_email || context.hrFallbackEmail,
    location: employee.location,
  });
  return cleanHtmlOutput(body);
}
