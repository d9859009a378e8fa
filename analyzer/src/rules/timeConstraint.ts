import { DEFAULT_TIMEZONE } from "../alarms/types";
import { ConfigurationError } from "../errors";
import {
  type WallClock,
  WALL_DATETIME_FORMAT,
  WALL_DATE_FORMAT,
  parseStrict,
  toWallClock,
} from "../utils/time";

const PERIOD_FORMATS: Array<{ format: string; dateOnly: boolean }> = [
  { format: "YYYY-MM-DD HH:mm:ss", dateOnly: false },
  { format: "YYYY-MM-DD HH:mm", dateOnly: false },
  { format: "YYYY-MM-DD", dateOnly: true },
];

const TIME_OF_DAY = /^(\d{1,2}):(\d{2})$/;

export const WEEKDAY_NAMES: ReadonlyMap<string, number> = new Map([
  ["monday", 0],
  ["mon", 0],
  ["tuesday", 1],
  ["tue", 1],
  ["wednesday", 2],
  ["wed", 2],
  ["thursday", 3],
  ["thu", 3],
  ["friday", 4],
  ["fri", 4],
  ["saturday", 5],
  ["sat", 5],
  ["sunday", 6],
  ["sun", 6],
]);

const WEEKDAY_LABELS = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
];

interface PeriodBound {
  // normalized "YYYY-MM-DD HH:mm:ss" wall-clock value
  dateTime: string;
  date: string;
  dateOnly: boolean;
}

function parsePeriodBound(value: string, field: string): PeriodBound {
  for (const { format, dateOnly } of PERIOD_FORMATS) {
    const match = parseStrict(value, [format]);
    if (match) {
      return {
        dateTime: match.parsed.format(WALL_DATETIME_FORMAT),
        date: match.parsed.format(WALL_DATE_FORMAT),
        dateOnly,
      };
    }
  }
  throw new ConfigurationError(
    `Invalid datetime format: ${value}. Expected YYYY-MM-DD or YYYY-MM-DD HH:MM[:SS]`,
    field,
  );
}

/** Datetime period, open-ended on either side when a bound is omitted. */
export class DateTimePeriod {
  private readonly start?: PeriodBound;
  private readonly end?: PeriodBound;

  constructor(start?: string, end?: string) {
    this.start = start ? parsePeriodBound(start, "periods.start") : undefined;
    this.end = end ? parsePeriodBound(end, "periods.end") : undefined;

    if (this.start && this.end && this.start.dateTime > this.end.dateTime) {
      throw new ConfigurationError(
        `start (${start}) must be before end (${end})`,
        "periods",
      );
    }
  }

  contains(wall: WallClock): boolean {
    if (this.start) {
      const before = this.start.dateOnly
        ? wall.date < this.start.date
        : wall.dateTime < this.start.dateTime;
      if (before) return false;
    }
    if (this.end) {
      // a date-only end includes the whole day
      const after = this.end.dateOnly
        ? wall.date > this.end.date
        : wall.dateTime > this.end.dateTime;
      if (after) return false;
    }
    return true;
  }

  equals(other: DateTimePeriod): boolean {
    return (
      this.start?.dateTime === other.start?.dateTime &&
      this.start?.dateOnly === other.start?.dateOnly &&
      this.end?.dateTime === other.end?.dateTime &&
      this.end?.dateOnly === other.end?.dateOnly
    );
  }

  toString(): string {
    return `${this.start?.dateTime ?? "∞"} → ${this.end?.dateTime ?? "∞"}`;
  }
}

function parseTimeOfDay(value: string, field: string): number {
  const match = TIME_OF_DAY.exec(value);
  const hours = match ? Number(match[1]) : NaN;
  const minutes = match ? Number(match[2]) : NaN;
  if (!match || hours > 23 || minutes > 59) {
    throw new ConfigurationError(
      `Invalid time format: ${value}. Expected HH:MM (24-hour format)`,
      field,
    );
  }
  return hours * 3600 + minutes * 60;
}

function formatTimeOfDay(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}

/** Time-of-day range, both ends inclusive. start > end wraps past midnight. */
export class TimeRange {
  readonly start: number;
  readonly end: number;

  constructor(start: string, end: string) {
    this.start = parseTimeOfDay(start, "hours.start");
    this.end = parseTimeOfDay(end, "hours.end");
  }

  contains(secondsOfDay: number): boolean {
    if (this.start <= this.end) {
      return this.start <= secondsOfDay && secondsOfDay <= this.end;
    }
    return secondsOfDay >= this.start || secondsOfDay <= this.end;
  }

  equals(other: TimeRange): boolean {
    return this.start === other.start && this.end === other.end;
  }

  toString(): string {
    return `${formatTimeOfDay(this.start)}-${formatTimeOfDay(this.end)}`;
  }
}

export interface TimeConstraintDefinition {
  periods?: Array<{ start?: string; end?: string }>;
  weekdays?: Array<number | string>;
  hours?: Array<{ start: string; end: string }>;
}

function parseWeekday(day: number | string): number {
  if (typeof day === "number") {
    if (!Number.isInteger(day) || day < 0 || day > 6) {
      throw new ConfigurationError(
        `Invalid weekday number: ${day}. Must be 0-6 (0=Monday, 6=Sunday)`,
        "weekdays",
      );
    }
    return day;
  }
  const weekday = WEEKDAY_NAMES.get(day.toLowerCase());
  if (weekday === undefined) {
    throw new ConfigurationError(
      `Invalid weekday name: ${day}. Expected: monday, tuesday, etc.`,
      "weekdays",
    );
  }
  return weekday;
}

/**
 * Composite time predicate: periods, weekdays and hour ranges.
 *
 * Every configured kind must match (AND); within one kind any entry is
 * enough (OR). A constraint with nothing configured matches any instant.
 * Instants are read as wall-clock time in `timezone`.
 */
export class TimeConstraint {
  readonly periods: readonly DateTimePeriod[];
  readonly weekdays: readonly number[];
  readonly hours: readonly TimeRange[];

  constructor(
    definition: TimeConstraintDefinition = {},
    readonly timezone: string = DEFAULT_TIMEZONE,
  ) {
    this.periods = (definition.periods ?? []).map(
      (period) => new DateTimePeriod(period.start, period.end),
    );
    this.weekdays = (definition.weekdays ?? []).map(parseWeekday);
    this.hours = (definition.hours ?? []).map(
      (range) => new TimeRange(range.start, range.end),
    );
  }

  isEmpty(): boolean {
    return (
      this.periods.length === 0 &&
      this.weekdays.length === 0 &&
      this.hours.length === 0
    );
  }

  /**
   * A missing timestamp only matches the empty constraint: nothing can be
   * said about when an undated alarm happened.
   */
  matches(timestamp: Date | null): boolean {
    if (this.isEmpty()) {
      return true;
    }
    if (!timestamp) {
      return false;
    }

    const wall = toWallClock(timestamp, this.timezone);

    if (
      this.periods.length > 0 &&
      !this.periods.some((period) => period.contains(wall))
    ) {
      return false;
    }
    if (this.weekdays.length > 0 && !this.weekdays.includes(wall.weekday)) {
      return false;
    }
    if (
      this.hours.length > 0 &&
      !this.hours.some((range) => range.contains(wall.secondsOfDay))
    ) {
      return false;
    }
    return true;
  }

  equals(other: TimeConstraint): boolean {
    return (
      this.periods.length === other.periods.length &&
      this.periods.every((period, i) => period.equals(other.periods[i])) &&
      this.weekdays.length === other.weekdays.length &&
      this.weekdays.every((day, i) => day === other.weekdays[i]) &&
      this.hours.length === other.hours.length &&
      this.hours.every((range, i) => range.equals(other.hours[i]))
    );
  }

  toString(): string {
    const parts: string[] = [];
    if (this.periods.length > 0) {
      parts.push(`periods=[${this.periods.join(", ")}]`);
    }
    if (this.weekdays.length > 0) {
      parts.push(
        `weekdays=[${this.weekdays.map((day) => WEEKDAY_LABELS[day]).join(", ")}]`,
      );
    }
    if (this.hours.length > 0) {
      parts.push(`hours=[${this.hours.join(", ")}]`);
    }
    return parts.length > 0
      ? `TimeConstraint(${parts.join(", ")})`
      : "TimeConstraint(empty)";
  }
}
