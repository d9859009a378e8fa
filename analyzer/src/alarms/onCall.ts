import { DEFAULT_TIMEZONE } from "./types";
import { type BusinessHours, DEFAULT_BUSINESS_HOURS } from "../config/types";
import { ConfigurationError } from "../errors";
import { toWallClock } from "../utils/time";

export function assertValidBusinessHours({ start, end }: BusinessHours): void {
  if (
    !Number.isInteger(start) ||
    !Number.isInteger(end) ||
    start < 0 ||
    end > 24 ||
    start >= end
  ) {
    throw new ConfigurationError(
      `Invalid business hours ${start}-${end}. Expected whole hours with 0 <= start < end <= 24`,
      "business_hours",
    );
  }
}

/**
 * Decides whether an on-call alarm fired outside business hours
 * ("in reperibilità"). The local hour is read from the zone offset in force
 * at the alarm's instant, so DST transitions need no special casing.
 */
export class OnCallClassifier {
  constructor(
    private readonly timezone: string = DEFAULT_TIMEZONE,
    private readonly businessHours: BusinessHours = DEFAULT_BUSINESS_HOURS,
  ) {
    assertValidBusinessHours(businessHours);
  }

  localHour(timestamp: Date): number {
    return toWallClock(timestamp, this.timezone).hour;
  }

  /** False for alarms without a timestamp: their hour cannot be known. */
  isOutsideBusinessHours(timestamp: Date | null): boolean {
    if (!timestamp) {
      return false;
    }
    const hour = this.localHour(timestamp);
    return hour < this.businessHours.start || hour >= this.businessHours.end;
  }
}
