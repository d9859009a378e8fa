import {
  type TimeWindow,
  DEFAULT_TIMEZONE,
} from "./types";
import { DateArgumentError } from "../errors";
import { WALL_DATE_FORMAT, dayjs, parseStrict, wallClockToEpochMs } from "../utils/time";

export const DATE_ARGUMENT_FORMAT = "DD-MM-YY";
export const MAX_LOOKBACK_DAYS = 30;

export interface DateSpan {
  // "YYYY-MM-DD" calendar dates, start <= end
  start: string;
  end: string;
}

function parseDay(value: string, argument: string): dayjs.Dayjs {
  const match = parseStrict(value.trim(), [DATE_ARGUMENT_FORMAT]);
  if (!match) {
    throw new DateArgumentError(
      `'${value}' is not a ${DATE_ARGUMENT_FORMAT} date (e.g. 24-06-25)`,
      argument,
    );
  }
  return match.parsed;
}

/** Parses "DD-MM-YY" or "DD-MM-YY:DD-MM-YY" into a calendar date span. */
export function parseDateArgument(argument: string): DateSpan {
  const separator = argument.indexOf(":");
  const startDay = parseDay(
    separator === -1 ? argument : argument.slice(0, separator),
    argument,
  );
  const endDay =
    separator === -1 ? startDay : parseDay(argument.slice(separator + 1), argument);

  if (startDay.isAfter(endDay)) {
    throw new DateArgumentError(
      "start date must be before or equal to end date",
      argument,
    );
  }

  return {
    start: startDay.format(WALL_DATE_FORMAT),
    end: endDay.format(WALL_DATE_FORMAT),
  };
}

/** Every calendar day of the argument, in DD-MM-YY form. */
export function expandDateRange(argument: string): string[] {
  const span = parseDateArgument(argument);
  const days: string[] = [];
  let current = dayjs(span.start, WALL_DATE_FORMAT, true);
  const last = dayjs(span.end, WALL_DATE_FORMAT, true);
  while (!current.isAfter(last)) {
    days.push(current.format(DATE_ARGUMENT_FORMAT));
    current = current.add(1, "day");
  }
  return days;
}

function shiftDate(date: string, days: number): string {
  return dayjs(date, WALL_DATE_FORMAT, true)
    .add(days, "day")
    .format(WALL_DATE_FORMAT);
}

/**
 * 18:00 local time of the day before the first date through 18:00 local
 * time of the last date: the "shift day" normal alarms are attributed to.
 */
export function getEveningWindow(
  argument: string,
  tz: string = DEFAULT_TIMEZONE,
): TimeWindow {
  const span = parseDateArgument(argument);
  return {
    oldest: wallClockToEpochMs(`${shiftDate(span.start, -1)} 18:00:00`, tz) / 1000,
    latest: wallClockToEpochMs(`${span.end} 18:00:00`, tz) / 1000,
  };
}

/**
 * 00:00:00 of the first date through 23:59:59.999999 of the last date, local
 * time: on-call alarms count on the calendar day they happen.
 */
export function getOnCallWindow(
  argument: string,
  tz: string = DEFAULT_TIMEZONE,
): TimeWindow {
  const span = parseDateArgument(argument);
  const nextMidnight = wallClockToEpochMs(`${shiftDate(span.end, 1)} 00:00:00`, tz);
  return {
    oldest: wallClockToEpochMs(`${span.start} 00:00:00`, tz) / 1000,
    latest: nextMidnight / 1000 - 0.000001,
  };
}

export function getLookbackWindow(daysBack: number, now: Date = new Date()): TimeWindow {
  if (!Number.isInteger(daysBack) || daysBack <= 0) {
    throw new DateArgumentError("days back must be a positive integer", String(daysBack));
  }
  if (daysBack > MAX_LOOKBACK_DAYS) {
    throw new DateArgumentError(
      `days back cannot exceed ${MAX_LOOKBACK_DAYS}`,
      String(daysBack),
    );
  }
  const latest = now.getTime() / 1000;
  return { oldest: latest - daysBack * 86400, latest };
}
