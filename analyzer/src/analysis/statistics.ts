import type { AnalysisResult } from "./types";
import { type AlarmRecord, DEFAULT_TIMEZONE } from "../alarms/types";
import { toWallClock } from "../utils/time";

export function rankAlarms(
  alarmStats: ReadonlyMap<string, readonly AlarmRecord[]>,
): Array<[string, readonly AlarmRecord[]]> {
  // Array.prototype.sort is stable, so ties keep insertion order
  return [...alarmStats.entries()].sort((a, b) => b[1].length - a[1].length);
}

/** Count of alarms per local hour (index 0-23); undated alarms are skipped. */
export function hourlyDistribution(
  alarms: readonly AlarmRecord[],
  tz: string = DEFAULT_TIMEZONE,
): number[] {
  const counts = new Array<number>(24).fill(0);
  for (const alarm of alarms) {
    if (alarm.timestamp) {
      counts[toWallClock(alarm.timestamp, tz).hour]++;
    }
  }
  return counts;
}

interface SerializedAlarm {
  id: string;
  name: string;
  location: string;
  timestamp: string | null;
  rawText: string;
}

export interface AnalysisSummary {
  alarmType: string | null;
  totalAlarms: number;
  analyzableAlarms: number;
  ignoredAlarms: number;
  oncallTotal: number;
  oncallInReperibilita: number;
  alarms: Array<{
    name: string;
    count: number;
    hourly: number[];
    entries: SerializedAlarm[];
  }>;
  ignoredMessages: Array<{
    timestamp: string | null;
    reason: string;
    rule: string;
    alarm: SerializedAlarm;
  }>;
}

function serializeAlarm(alarm: AlarmRecord): SerializedAlarm {
  return {
    id: alarm.id,
    name: alarm.name,
    location: alarm.location,
    timestamp: alarm.timestamp ? alarm.timestamp.toISOString() : null,
    rawText: alarm.rawText,
  };
}

export function toAnalysisSummary(
  result: AnalysisResult,
  tz: string = DEFAULT_TIMEZONE,
): AnalysisSummary {
  return {
    alarmType: result.alarmType ? result.alarmType.toString() : null,
    totalAlarms: result.totalAlarms,
    analyzableAlarms: result.analyzableAlarms,
    ignoredAlarms: result.ignoredAlarms,
    oncallTotal: result.oncallTotal,
    oncallInReperibilita: result.oncallInReperibilita,
    alarms: rankAlarms(result.alarmStats).map(([name, entries]) => ({
      name,
      count: entries.length,
      hourly: hourlyDistribution(entries, tz),
      entries: entries.map(serializeAlarm),
    })),
    ignoredMessages: result.ignoredMessages.map((ignored) => ({
      timestamp: ignored.timestamp ? ignored.timestamp.toISOString() : null,
      reason: ignored.reason,
      rule: ignored.rule.toString(),
      alarm: serializeAlarm(ignored.alarm),
    })),
  };
}
