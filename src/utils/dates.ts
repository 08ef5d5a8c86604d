/**
 * Calendar-date helpers. Values are wall-clock dates, which is how the
 * directory stores `date_joined` and how Calendar expects dateTime + timeZone
 * pairs.
 */

const pad = (n: number) => n.toString().padStart(2, "0");

/** YYYY-MM-DD for the local date of `date` */
export function toIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** YYYY-MM-DDTHH:MM:SS for the local time of `date` */
export function toLocalIsoSeconds(date: Date): string {
  return `${toIsoDate(date)}T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** New Date `days` calendar days after `date` (negative to go back) */
export function addDays(date: Date, days: number): Date {
  const result = new Date(date.getFullYear(), date.getMonth(), date.getDate());
  result.setDate(result.getDate() + days);
  return result;
}

export interface TimeSlot {
  date: string;
  start: string;
  end: string;
}

/** YYYY-MM-DD of the calendar day `date` falls on in `timeZone` */
export function isoDateInZone(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "";
  return `${part("year")}-${part("month")}-${part("day")}`;
}

function shiftIsoDate(isoDate: string, days: number): string {
  const [year, month, day] = isoDate.split("-").map(Number);
  return new Date(Date.UTC(year, month - 1, day + days)).toISOString().slice(0, 10);
}

/**
 * Slot on the same weekday next week, e.g. 10:00 to 11:00.
 * "Today" is taken in `timeZone` when given, otherwise in the host's zone.
 * Returned as wall-clock date-times without offset, to be paired with that zone.
 */
export function nextWeekSlot(today: Date, startHour: number, durationHours = 1, timeZone?: string): TimeSlot {
  const todayIso = timeZone ? isoDateInZone(today, timeZone) : toIsoDate(today);
  const date = shiftIsoDate(todayIso, 7);
  return {
    date,
    start: `${date}T${pad(startHour)}:00:00`,
    end: `${date}T${pad(startHour + durationHours)}:00:00`,
  };
}
