/**
 * Core TypeScript types
 */

// ============================================================================
// Employee Directory
// ============================================================================

export type EmployeeLevel = "junior" | "senior";

/**
 * A row of the employee directory
 */
export interface Employee {
  id: number;
  name: string;
  email: string;
  role: string;
  department: string;
  /** ISO date (YYYY-MM-DD) */
  date_joined: string;
  location: string;
  level: EmployeeLevel;
  manager_email: string | null;
}

/**
 * Employee fields accepted when adding a directory entry
 */
export type NewEmployee = Omit<Employee, "id">;

// ============================================================================
// Integration Results
// ============================================================================

export interface EmailResult {
  success: boolean;
  messageId?: string;
  email: string;
  error?: string;
}

/**
 * Asana task as returned by POST /tasks (only the fields we request)
 */
export interface AsanaTask {
  gid: string;
  name: string;
  permalink_url?: string;
  created_at?: string;
  assignee?: { gid: string; name?: string } | null;
  projects?: Array<{ gid: string; name?: string }>;
  workspace?: { gid: string; name?: string };
}

export interface CalendarEventResult {
  id: string;
  htmlLink?: string;
  hangoutLink?: string;
}

export interface Reminder {
  method: "email" | "popup";
  minutes: number;
}

// ============================================================================
// Onboarding Run
// ============================================================================

export interface RunSummary {
  processed: number;
  successes: number;
  failures: string[];
  message?: string;
}

// ============================================================================
// Chat
// ============================================================================

export interface ChatTurn {
  sender: "user" | "assistant";
  text: string;
}
