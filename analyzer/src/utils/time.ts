import dayjs from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";
import timezone from "dayjs/plugin/timezone";
import utc from "dayjs/plugin/utc";

dayjs.extend(utc);
dayjs.extend(timezone);
dayjs.extend(customParseFormat);

export const WALL_DATE_FORMAT = "YYYY-MM-DD";
export const WALL_DATETIME_FORMAT = "YYYY-MM-DD HH:mm:ss";

/**
 * Local calendar and clock reading of an instant in a given timezone.
 * `weekday` is 0 for Monday through 6 for Sunday.
 */
export interface WallClock {
  date: string;
  dateTime: string;
  weekday: number;
  secondsOfDay: number;
  hour: number;
}

export function toWallClock(instant: Date, tz: string): WallClock {
  const local = dayjs(instant).tz(tz);
  return {
    date: local.format(WALL_DATE_FORMAT),
    dateTime: local.format(WALL_DATETIME_FORMAT),
    weekday: (local.day() + 6) % 7,
    secondsOfDay: local.hour() * 3600 + local.minute() * 60 + local.second(),
    hour: local.hour(),
  };
}

/**
 * Interprets a wall-clock value ("YYYY-MM-DD HH:mm:ss") in `tz` and returns
 * the absolute instant, using the zone offset in force at that moment.
 */
export function wallClockToEpochMs(wallDateTime: string, tz: string): number {
  return dayjs.tz(wallDateTime, tz).valueOf();
}

/** Strict parse of a value in one of `formats`; null when none matches. */
export function parseStrict(
  value: string,
  formats: string[],
): { parsed: dayjs.Dayjs; format: string } | null {
  for (const format of formats) {
    const parsed = dayjs(value, format, true);
    if (parsed.isValid()) {
      return { parsed, format };
    }
  }
  return null;
}

export function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch (_error) {
    return false;
  }
}

export { dayjs };
