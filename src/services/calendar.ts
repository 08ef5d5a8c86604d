/**
 * Google Calendar client: schedules events with a Google Meet link
 */

import { google, type calendar_v3 } from "googleapis";
import type { CalendarEventResult, Reminder } from "@/core/types";
import { IntegrationError, errorMessage } from "@/core/errors";
import type { GoogleOAuthClient } from "./google-auth";
import { logger } from "@/utils/logger";

const log = logger.calendar;

export const DEFAULT_REMINDERS: Reminder[] = [
  { method: "email", minutes: 24 * 60 },
  { method: "popup", minutes: 30 },
];

export interface EventRequest {
  summary: string;
  location: string;
  description: string;
  /** Local date-time without offset, e.g. 2025-08-14T10:00:00 */
  startTime: string;
  endTime: string;
  attendees: string[];
  timezone: string;
  reminders?: Reminder[];
  conferenceRequestId: string;
}

/**
 * Event resource for events.insert
 */
export function buildEventBody(request: EventRequest): calendar_v3.Schema$Event {
  const overrides = request.reminders && request.reminders.length > 0
    ? request.reminders
    : DEFAULT_REMINDERS;

  return {
    summary: request.summary,
    location: request.location,
    description: request.description,
    start: { dateTime: request.startTime, timeZone: request.timezone },
    end: { dateTime: request.endTime, timeZone: request.timezone },
    attendees: request.attendees.map((email) => ({ email })),
    reminders: {
      useDefault: false,
      overrides,
    },
    conferenceData: {
      createRequest: {
        requestId: request.conferenceRequestId,
        conferenceSolutionKey: { type: "hangoutsMeet" },
      },
    },
  };
}

export class CalendarClient {
  private readonly calendar: calendar_v3.Calendar;

  constructor(auth: GoogleOAuthClient, private readonly calendarId = "primary") {
    this.calendar = google.calendar({ version: "v3", auth });
  }

  async scheduleEvent(request: EventRequest): Promise<CalendarEventResult> {
    log.info("Scheduling event", { summary: request.summary, start: request.startTime });
    const start = performance.now();

    try {
      const response = await this.calendar.events.insert({
        calendarId: this.calendarId,
        conferenceDataVersion: 1,
        sendUpdates: "all",
        requestBody: buildEventBody(request),
      });

      const event = response.data;
      if (!event.id) {
        throw new Error("Response did not include an event id");
      }

      log.info("Event created", {
        eventId: event.id,
        meetLink: event.hangoutLink,
        durationMs: Math.round(performance.now() - start),
      });

      return {
        id: event.id,
        htmlLink: event.htmlLink ?? undefined,
        hangoutLink: event.hangoutLink ?? undefined,
      };
    } catch (error) {
      if (error instanceof IntegrationError) throw error;
      const status = readStatus(error);
      log.error("Event creation failed", { summary: request.summary, status, error: errorMessage(error) });
      throw new IntegrationError("calendar", "event creation", errorMessage(error), status);
    }
  }
}

/** HTTP status from a gaxios error, when present */
function readStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const { status } = error;
    if (typeof status === "number") return status;
  }
  return undefined;
}
