/**
 * Core types, schemas and configuration for the onboarding assistant
 */

export type {
  Employee,
  EmployeeLevel,
  NewEmployee,
  EmailResult,
  AsanaTask,
  CalendarEventResult,
  Reminder,
  RunSummary,
  ChatTurn,
} from "./types";

export { NewEmployeeSchema, EnvSchema, REQUIRED_ENV_KEYS } from "./schemas";
export { loadConfig, loadEnvFile, type AppConfig } from "./config";
export { IntegrationError, ConfigError, errorMessage } from "./errors";
