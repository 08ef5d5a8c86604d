/**
 * Employee directory backed by SQLite (better-sqlite3)
 *
 * The directory is the source of new joiners and mentors for the onboarding
 * workflow. `bootstrap()` recreates it with a small sample data set.
 */

import Database from "better-sqlite3";
import type { Employee, NewEmployee } from "@/core/types";
import { NewEmployeeSchema } from "@/core/schemas";
import { addDays, toIsoDate } from "@/utils/dates";
import { logger } from "@/utils/logger";

const log = logger.directory;

// ============================================================================
// Schema
// ============================================================================

const CREATE_TABLE = `
  CREATE TABLE employees (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    email TEXT NOT NULL,
    role TEXT NOT NULL,
    department TEXT NOT NULL,
    date_joined TEXT NOT NULL,
    location TEXT NOT NULL,
    level TEXT NOT NULL CHECK (level IN ('junior', 'senior')),
    manager_email TEXT
  )
`;

const INSERT_EMPLOYEE = `
  INSERT INTO employees (name, email, role, department, date_joined, location, level, manager_email)
  VALUES (@name, @email, @role, @department, @date_joined, @location, @level, @manager_email)
`;

// ============================================================================
// Sample data
// ============================================================================

interface SampleEmployee extends Omit<NewEmployee, "date_joined" | "role"> {
  /** Days before today; the row's date_joined is derived from it */
  joinedDaysAgo: number;
  /** Whether the row belongs to the target role or to another one */
  targetRole: boolean;
  otherRole?: string;
}

const SAMPLE_EMPLOYEES: SampleEmployee[] = [
  // New joiners
  { name: "Priya Menon", email: "priya.menon@example.com", department: "Data Platform", joinedDaysAgo: 0, location: "Bengaluru", level: "junior", manager_email: "lead.de@example.com", targetRole: true },
  { name: "Rahul Iyer", email: "rahul.iyer@example.com", department: "Data Platform", joinedDaysAgo: 100, location: "Bengaluru", level: "junior", manager_email: "lead.de@example.com", targetRole: true },
  // Senior mentors
  { name: "Anita Desai", email: "anita.desai@example.com", department: "Data Platform", joinedDaysAgo: 400, location: "Bengaluru", level: "senior", manager_email: "director.de@example.com", targetRole: true },
  { name: "Vikram Joshi", email: "vikram.joshi@example.com", department: "Data Platform", joinedDaysAgo: 900, location: "Pune", level: "senior", manager_email: "director.de@example.com", targetRole: true },
  // Other roles
  { name: "Meera Nair", email: "meera.nair@example.com", department: "App Eng", joinedDaysAgo: 7, location: "Bengaluru", level: "junior", manager_email: "lead.be@example.com", targetRole: false, otherRole: "Backend Engineer" },
];

export function sampleEmployees(role: string, today: Date): NewEmployee[] {
  return SAMPLE_EMPLOYEES.map(({ joinedDaysAgo, targetRole, otherRole, ...rest }) => ({
    ...rest,
    role: targetRole ? role : (otherRole ?? "Backend Engineer"),
    date_joined: toIsoDate(addDays(today, -joinedDaysAgo)),
  }));
}

// ============================================================================
// Directory
// ============================================================================

export interface NewJoinerQuery {
  role: string;
  joinedSinceDays: number;
  today?: Date;
}

export interface MentorQuery {
  role: string;
  preferredLocation: string;
}

export interface BootstrapOptions {
  role: string;
  today?: Date;
  /** Skip the sample rows */
  empty?: boolean;
}

export class EmployeeDirectory {
  private readonly db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    log.debug("Opened employee directory", { filename });
  }

  /** True when the employees table exists */
  isInitialized(): boolean {
    const row = this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'employees'"
      )
      .get();
    return row !== undefined;
  }

  /**
   * Drop and recreate the employees table, then seed the sample rows
   */
  bootstrap(options: BootstrapOptions): number {
    const today = options.today ?? new Date();

    const reset = this.db.transaction(() => {
      this.db.exec("DROP TABLE IF EXISTS employees");
      this.db.exec(CREATE_TABLE);
      if (options.empty) return 0;

      const insert = this.db.prepare<[NewEmployee]>(INSERT_EMPLOYEE);
      const rows = sampleEmployees(options.role, today);
      for (const row of rows) insert.run(row);
      return rows.length;
    });

    const seeded = reset();
    log.info("Directory bootstrapped", { seeded });
    return seeded;
  }

  addEmployee(input: unknown): Employee {
    const employee = NewEmployeeSchema.parse(input);
    const result = this.db.prepare<[NewEmployee]>(INSERT_EMPLOYEE).run(employee);
    const id = Number(result.lastInsertRowid);
    log.debug("Employee added", { id, email: employee.email });
    return { id, ...employee };
  }

  listEmployees(): Employee[] {
    return this.db
      .prepare<[], Employee>("SELECT * FROM employees ORDER BY date(date_joined) DESC, id ASC")
      .all();
  }

  /**
   * Juniors of `role` who joined within the last `joinedSinceDays` days (inclusive)
   */
  findNewJoiners({ role, joinedSinceDays, today = new Date() }: NewJoinerQuery): Employee[] {
    const cutoff = toIsoDate(addDays(today, -joinedSinceDays));
    const rows = this.db
      .prepare<[string, string], Employee>(`
        SELECT * FROM employees
         WHERE role = ?
           AND date(date_joined) >= date(?)
           AND level = 'junior'
         ORDER BY id ASC
      `)
      .all(role, cutoff);

    log.info("New joiners found", { role, cutoff, count: rows.length });
    return rows;
  }

  /**
   * Longest-tenured senior of `role`, preferring `preferredLocation`
   */
  findSeniorMentor({ role, preferredLocation }: MentorQuery): Employee | null {
    const local = this.db
      .prepare<[string, string], Employee>(`
        SELECT * FROM employees
         WHERE role = ?
           AND level = 'senior'
           AND location = ?
         ORDER BY date(date_joined) ASC, id ASC
         LIMIT 1
      `)
      .get(role, preferredLocation);
    if (local) return local;

    // Fall back to any senior if none in location
    const anywhere = this.db
      .prepare<[string], Employee>(`
        SELECT * FROM employees
         WHERE role = ?
           AND level = 'senior'
         ORDER BY date(date_joined) ASC, id ASC
         LIMIT 1
      `)
      .get(role);

    if (anywhere) {
      log.debug("No mentor in location, using fallback", {
        preferredLocation,
        mentorLocation: anywhere.location,
      });
    }
    return anywhere ?? null;
  }

  close() {
    this.db.close();
  }
}
