import { OnCallClassifier } from "../src/alarms/onCall";
import { ConfigurationError } from "../src/errors";

describe("OnCallClassifier", () => {
  const classifier = new OnCallClassifier();

  test.each([
    ["2025-01-06T07:59:00Z", true],
    ["2025-01-06T08:00:00Z", false],
    ["2025-01-06T16:59:00Z", false],
    ["2025-01-06T17:00:00Z", true],
    ["2025-01-06T23:30:00Z", true],
  ])("in winter, %s is outside business hours: %s", (iso, expected) => {
    expect(classifier.isOutsideBusinessHours(new Date(iso))).toBe(expected);
  });

  test.each([
    ["2025-07-07T06:59:00Z", true],
    ["2025-07-07T07:00:00Z", false],
    ["2025-07-07T15:59:00Z", false],
    ["2025-07-07T16:00:00Z", true],
  ])("in summer, %s is outside business hours: %s", (iso, expected) => {
    expect(classifier.isOutsideBusinessHours(new Date(iso))).toBe(expected);
  });

  test("should read the local hour", () => {
    expect(classifier.localHour(new Date("2025-01-06T23:30:00Z"))).toBe(0);
  });

  test("should not flag alarms without timestamp", () => {
    expect(classifier.isOutsideBusinessHours(null)).toBe(false);
  });

  test("should accept custom business hours", () => {
    const late = new OnCallClassifier("UTC", { start: 8, end: 20 });
    expect(late.isOutsideBusinessHours(new Date("2025-01-06T19:59:00Z"))).toBe(false);
    expect(late.isOutsideBusinessHours(new Date("2025-01-06T20:00:00Z"))).toBe(true);
  });

  test.each([
    { start: 18, end: 9 },
    { start: 9.5, end: 18 },
    { start: -1, end: 18 },
    { start: 9, end: 25 },
  ])("should reject business hours %o", (hours) => {
    expect(() => new OnCallClassifier("UTC", hours)).toThrow(ConfigurationError);
  });
});
