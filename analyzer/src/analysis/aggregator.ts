import { type Logger } from "winston";

import { type IgnoredMessage, type AnalysisResult, createEmptyResult } from "./types";
import type { AlarmType } from "../alarms/alarmType";
import { getMessageExtractor } from "../alarms/extractors";
import type { OnCallClassifier } from "../alarms/onCall";
import type { AlarmRecord, RawEvent } from "../alarms/types";
import type { IgnoreRule } from "../rules/ignoreRule";
import type { IgnoreRuleEngine } from "../rules/ignoreRuleEngine";

function buildIgnoredMessage(
  event: RawEvent,
  alarm: AlarmRecord,
  rule: IgnoreRule,
  reason: string,
): IgnoredMessage {
  const attachment = event.attachments?.[0];
  const file = event.files?.[0];
  return {
    timestamp: alarm.timestamp,
    reason,
    rule,
    alarm,
    text: event.text || undefined,
    title: attachment?.title || undefined,
    fallback: attachment?.fallback || undefined,
    fileName: file?.name || undefined,
    fileText: file?.plain_text || undefined,
  };
}

/**
 * Runs extraction, classification, ignore evaluation and on-call tagging
 * over the events of one alarm type, and merges per-type results.
 */
export class AnalysisAggregator {
  constructor(
    private readonly ignoreEngine: IgnoreRuleEngine,
    private readonly onCallClassifier: OnCallClassifier,
    private readonly logger: Logger,
  ) {
    this.logger = logger.child({ module: "AnalysisAggregator" });
  }

  analyze(events: readonly RawEvent[], alarmType: AlarmType): AnalysisResult {
    const extractor = getMessageExtractor(
      alarmType.product,
      alarmType.environment,
    );
    const result = createEmptyResult(alarmType);

    for (const event of events) {
      const alarm = extractor.extract(event);
      if (!alarm || !alarmType.matches(alarm.name)) {
        continue;
      }

      result.totalAlarms++;

      const decision = this.ignoreEngine.evaluate(
        alarm,
        event,
        alarmType.environment,
      );
      if (decision.ignored && decision.rule && decision.reason) {
        result.ignoredAlarms++;
        result.ignoredMessages.push(
          buildIgnoredMessage(event, alarm, decision.rule, decision.reason),
        );
        this.logger.debug("Alarm ignored", {
          alarm: alarm.name,
          id: alarm.id,
          reason: decision.reason,
        });
        continue;
      }

      result.analyzableAlarms++;
      const bucket = result.alarmStats.get(alarm.name);
      if (bucket) {
        bucket.push(alarm);
      } else {
        result.alarmStats.set(alarm.name, [alarm]);
      }

      if (alarmType.isOnCall()) {
        result.oncallTotal++;
        if (this.onCallClassifier.isOutsideBusinessHours(alarm.timestamp)) {
          result.oncallInReperibilita++;
        }
      }
    }

    this.logger.debug(`Analyzed ${events.length} events for ${alarmType}`, {
      total: result.totalAlarms,
      analyzable: result.analyzableAlarms,
      ignored: result.ignoredAlarms,
      oncall: result.oncallTotal,
    });

    return result;
  }

  /** Analyzes each batch with its alarm type and merges in the given order. */
  analyzeAll(
    batches: ReadonlyArray<{ alarmType: AlarmType; events: readonly RawEvent[] }>,
  ): AnalysisResult {
    return mergeAnalysisResults(
      batches.map(({ alarmType, events }) => this.analyze(events, alarmType)),
    );
  }
}

/**
 * Combines per-type results: alarm buckets are unioned with their entries
 * concatenated in input order, counters are summed and ignored messages
 * concatenated. The inputs are left untouched.
 */
export function mergeAnalysisResults(
  results: readonly AnalysisResult[],
): AnalysisResult {
  const merged = createEmptyResult();

  for (const result of results) {
    for (const [name, alarms] of result.alarmStats) {
      const bucket = merged.alarmStats.get(name);
      if (bucket) {
        bucket.push(...alarms);
      } else {
        merged.alarmStats.set(name, [...alarms]);
      }
    }

    merged.totalAlarms += result.totalAlarms;
    merged.analyzableAlarms += result.analyzableAlarms;
    merged.ignoredAlarms += result.ignoredAlarms;
    merged.oncallTotal += result.oncallTotal;
    merged.oncallInReperibilita += result.oncallInReperibilita;
    merged.ignoredMessages.push(...result.ignoredMessages);
  }

  return merged;
}
