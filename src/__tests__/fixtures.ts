import type { Employee } from "@/core/types";

export function makeEmployee(overrides: Partial<Employee> = {}): Employee {
  return {
    id: 1,
    name: "Priya Menon",
    email: "priya.menon@example.com",
    role: "Data Engineer",
    department: "Data Platform",
    date_joined: "2025-08-14",
    location: "Bengaluru",
    level: "junior",
    manager_email: "lead.de@example.com",
    ...overrides,
  };
}

export function makeMentor(overrides: Partial<Employee> = {}): Employee {
  return makeEmployee({
    id: 3,
    name: "Anita Desai",
    email: "anita.desai@example.com",
    date_joined: "2024-07-10",
    level: "senior",
    manager_email: "director.de@example.com",
    ...overrides,
  });
}
