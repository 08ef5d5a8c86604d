/**
 * Error types shared across services
 */

export type IntegrationService = "asana" | "calendar" | "gmail" | "google-auth";

const SERVICE_LABELS: Record<IntegrationService, string> = {
  asana: "Asana",
  calendar: "Google Calendar",
  gmail: "Gmail",
  "google-auth": "Google auth",
};

/**
 * Failure talking to a third-party API
 */
export class IntegrationError extends Error {
  readonly service: IntegrationService;
  readonly status?: number;

  constructor(
    service: IntegrationService,
    operation: string,
    details: string,
    status?: number,
  ) {
    const statusPart = status !== undefined ? ` (${status})` : "";
    super(`${SERVICE_LABELS[service]} ${operation} failed${statusPart}: ${details}`);
    this.name = "IntegrationError";
    this.service = service;
    this.status = status;
  }
}

/**
 * Invalid or incomplete configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
