import { describe, it, expect } from "vitest";
import { addDays, isoDateInZone, nextWeekSlot, toIsoDate, toLocalIsoSeconds } from "@/utils/dates";

describe("dates", () => {
  it("formats local dates and times", () => {
    const date = new Date(2025, 0, 5, 7, 3, 9);
    expect(toIsoDate(date)).toBe("2025-01-05");
    expect(toLocalIsoSeconds(date)).toBe("2025-01-05T07:03:09");
  });

  it("adds and subtracts calendar days across month boundaries", () => {
    const today = new Date(2025, 7, 14);
    expect(toIsoDate(addDays(today, -14))).toBe("2025-07-31");
    expect(toIsoDate(addDays(today, -100))).toBe("2025-05-06");
    expect(toIsoDate(addDays(today, 20))).toBe("2025-09-03");
  });

  it("picks the same weekday next week", () => {
    const slot = nextWeekSlot(new Date(2025, 7, 14, 16, 45), 10);
    expect(slot).toEqual({
      date: "2025-08-21",
      start: "2025-08-21T10:00:00",
      end: "2025-08-21T11:00:00",
    });
  });

  it("rolls over the year end", () => {
    const slot = nextWeekSlot(new Date(2025, 11, 29), 9, 2);
    expect(slot).toEqual({
      date: "2026-01-05",
      start: "2026-01-05T09:00:00",
      end: "2026-01-05T11:00:00",
    });
  });

  it("reads the calendar day in the given time zone", () => {
    const instant = new Date(Date.UTC(2025, 7, 14, 19, 0));
    expect(isoDateInZone(instant, "UTC")).toBe("2025-08-14");
    expect(isoDateInZone(instant, "Asia/Kolkata")).toBe("2025-08-15");
  });

  it("anchors next week's slot to the configured time zone", () => {
    // 19:00 UTC is already 00:30 the next day in Kolkata
    const instant = new Date(Date.UTC(2025, 7, 14, 19, 0));
    expect(nextWeekSlot(instant, 10, 1, "Asia/Kolkata")).toEqual({
      date: "2025-08-22",
      start: "2025-08-22T10:00:00",
      end: "2025-08-22T11:00:00",
    });
    expect(nextWeekSlot(instant, 10, 1, "UTC").date).toBe("2025-08-21");
  });
});
