import type { AlarmType } from "../alarms/alarmType";
import type { AlarmRecord } from "../alarms/types";
import type { IgnoreRule } from "../rules/ignoreRule";

export interface IgnoredMessage {
  timestamp: Date | null;
  reason: string;
  rule: IgnoreRule;
  alarm: AlarmRecord;
  text?: string;
  title?: string;
  fallback?: string;
  fileName?: string;
  fileText?: string;
}

export interface AnalysisResult {
  // insertion order follows event order
  alarmStats: Map<string, AlarmRecord[]>;
  totalAlarms: number;
  analyzableAlarms: number;
  ignoredAlarms: number;
  ignoredMessages: IgnoredMessage[];
  oncallTotal: number;
  oncallInReperibilita: number;
  alarmType?: AlarmType;
}

export function createEmptyResult(alarmType?: AlarmType): AnalysisResult {
  return {
    alarmStats: new Map(),
    totalAlarms: 0,
    analyzableAlarms: 0,
    ignoredAlarms: 0,
    ignoredMessages: [],
    oncallTotal: 0,
    oncallInReperibilita: 0,
    alarmType,
  };
}
