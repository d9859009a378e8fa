import type { AlarmRecord } from "../src/alarms/types";
import {
  hourlyDistribution,
  rankAlarms,
  toAnalysisSummary,
} from "../src/analysis/statistics";
import { createEmptyResult } from "../src/analysis/types";
import { IgnoreRule } from "../src/rules/ignoreRule";

const alarm = (id: string, name: string, iso: string | null): AlarmRecord => ({
  id,
  name,
  location: "EU (Milan)",
  timestamp: iso ? new Date(iso) : null,
  rawText: `raw ${id}`,
});

describe("Alarm statistics", () => {
  test("should rank by count and keep insertion order on ties", () => {
    const stats = new Map([
      ["A", [alarm("1", "A", null)]],
      ["B", [alarm("2", "B", null), alarm("3", "B", null)]],
      ["C", [alarm("4", "C", null)]],
    ]);
    expect(rankAlarms(stats).map(([name]) => name)).toEqual(["B", "A", "C"]);
  });

  test("should count alarms per local hour", () => {
    const counts = hourlyDistribution([
      alarm("1", "A", "2025-01-01T10:00:00Z"),
      alarm("2", "A", "2025-01-01T10:30:00Z"),
      alarm("3", "A", "2025-01-01T23:30:00Z"),
      alarm("4", "A", null),
    ]);
    expect(counts).toHaveLength(24);
    expect(counts[11]).toBe(2);
    expect(counts[0]).toBe(1);
    expect(counts.reduce((sum, count) => sum + count, 0)).toBe(3);
  });

  test("should build a JSON-ready summary", () => {
    const result = createEmptyResult();
    const dbTimeout = alarm("1", "DB-Timeout", "2025-01-01T10:00:00Z");
    const diskFull = alarm("2", "Disk-Full", null);
    result.alarmStats.set("DB-Timeout", [dbTimeout]);
    result.totalAlarms = 2;
    result.analyzableAlarms = 1;
    result.ignoredAlarms = 1;
    result.ignoredMessages.push({
      timestamp: null,
      reason: "noise",
      rule: new IgnoreRule({ pattern: "Disk", reason: "noise" }),
      alarm: diskFull,
    });

    const summary = toAnalysisSummary(result, "UTC");

    expect(summary.alarmType).toBeNull();
    expect(summary.alarms).toHaveLength(1);
    expect(summary.alarms[0].name).toBe("DB-Timeout");
    expect(summary.alarms[0].count).toBe(1);
    expect(summary.alarms[0].hourly[10]).toBe(1);
    expect(summary.alarms[0].entries[0]).toEqual({
      id: "1",
      name: "DB-Timeout",
      location: "EU (Milan)",
      timestamp: "2025-01-01T10:00:00.000Z",
      rawText: "raw 1",
    });
    expect(summary.ignoredMessages).toEqual([
      {
        timestamp: null,
        reason: "noise",
        rule: "IgnoreRule(pattern='Disk', path='*', reason='noise')",
        alarm: {
          id: "2",
          name: "Disk-Full",
          location: "EU (Milan)",
          timestamp: null,
          rawText: "raw 2",
        },
      },
    ]);
  });
});
