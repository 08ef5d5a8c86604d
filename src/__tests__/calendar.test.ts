import { describe, it, expect } from "vitest";
import { buildEventBody, DEFAULT_REMINDERS, type EventRequest } from "@/services/calendar";

const REQUEST: EventRequest = {
  summary: "Intro chat: Priya Menon x Anita Desai (Data Platform)",
  location: "Google Meet",
  description: "Welcome Priya Menon.\n",
  startTime: "2025-08-21T10:00:00",
  endTime: "2025-08-21T11:00:00",
  attendees: ["priya.menon@example.com", "anita.desai@example.com"],
  timezone: "Asia/Kolkata",
  reminders: [{ method: "popup", minutes: 30 }],
  conferenceRequestId: "mentor-1-2025-08-21",
};

describe("buildEventBody", () => {
  it("builds a Meet-enabled event in the given time zone", () => {
    expect(buildEventBody(REQUEST)).toEqual({
      summary: "Intro chat: Priya Menon x Anita Desai (Data Platform)",
      location: "Google Meet",
      description: "Welcome Priya Menon.\n",
      start: { dateTime: "2025-08-21T10:00:00", timeZone: "Asia/Kolkata" },
      end: { dateTime: "2025-08-21T11:00:00", timeZone: "Asia/Kolkata" },
      attendees: [{ email: "priya.menon@example.com" }, { email: "anita.desai@example.com" }],
      reminders: {
        useDefault: false,
        overrides: [{ method: "popup", minutes: 30 }],
      },
      conferenceData: {
        createRequest: {
          requestId: "mentor-1-2025-08-21",
          conferenceSolutionKey: { type: "hangoutsMeet" },
        },
      },
    });
  });

  it("uses email and popup reminders when none are given", () => {
    const body = buildEventBody({ ...REQUEST, reminders: undefined });
    expect(body.reminders?.overrides).toEqual([
      { method: "email", minutes: 1440 },
      { method: "popup", minutes: 30 },
    ]);
    expect(DEFAULT_REMINDERS).toHaveLength(2);
  });

  it("treats an empty reminder list as unset", () => {
    const body = buildEventBody({ ...REQUEST, reminders: [] });
    expect(body.reminders?.overrides).toEqual(DEFAULT_REMINDERS);
  });
});
