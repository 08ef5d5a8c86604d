/**
 * Prompt templates for welcome emails and chat
 */

import { ChatPromptTemplate, MessagesPlaceholder } from "@langchain/core/prompts";

// ============================================================================
// Welcome email
// ============================================================================

const EMAIL_SYSTEM_PROMPT = "You are HR Ops helping write friendly welcome emails.";

const EMAIL_HUMAN_PROMPT = `Write a warm, welcoming **HTML email** for a new {role} joining the {team} team at {company}.

Requirements:
- Output **only raw HTML**, no triple backticks, no extra markdown, no "html" tag outside the HTML structure.
- Use inline CSS for styling so it looks elegant across all email clients.
- Incorporate subtle brand colors:
  - Primary accent: #FF3621
  - Secondary: #1B3139
  - Background: #F9F7F4
- Use clean typography (e.g., sans-serif fonts) with proper spacing.
- Include:
  - A friendly greeting with {name}
  - A short paragraph welcoming them to the team
  - A section about what their first week will look like
  - A note about onboarding tasks in Asana which they receive soon via email
  - Contact info for their manager: {manager_email}
  - Sign-off from HR
- Make sure the HTML looks balanced, mobile-friendly, and visually appealing.
- Avoid overly fancy graphics, keep it modern and readable.

Personalization fields:
- Name: {name}
- Role: {role}
- Team: {team}
- Start Date: {start_date}
- Manager Email: {manager_email}
- Location: {location}

Return **only the HTML body**, no code fences, no extra commentary.`;

export const EMAIL_PROMPT = ChatPromptTemplate.fromMessages([
  ["system", EMAIL_SYSTEM_PROMPT],
  ["human", EMAIL_HUMAN_PROMPT],
]);

// ============================================================================
// Chat
// ============================================================================

export const CHAT_SYSTEM_PROMPT = "You are an HR Tech assistant. Keep responses friendly and chill.";

export const CHAT_PROMPT = ChatPromptTemplate.fromMessages([
  ["system", CHAT_SYSTEM_PROMPT],
  new MessagesPlaceholder("history"),
  ["human", "{input}"],
]);
