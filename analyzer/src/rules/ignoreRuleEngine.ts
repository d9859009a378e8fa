import { type IgnoreRule, type RulePath } from "./ignoreRule";
import { extractAlarmNameFromTitle } from "../alarms/extractors";
import type { AlarmRecord, RawEvent } from "../alarms/types";

export interface IgnoreDecision {
  ignored: boolean;
  rule?: IgnoreRule;
  reason?: string;
}

const NOT_IGNORED: IgnoreDecision = Object.freeze({ ignored: false });

function asText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function containsPattern(pattern: string, text: string): boolean {
  if (!pattern || !text) {
    return false;
  }
  return text.toLowerCase().includes(pattern.toLowerCase());
}

/** Texts searched by a "*" rule: event text, attachment title/fallback/text, file name/plain_text. */
function allFieldValues(event: RawEvent): string[] {
  const values = [asText(event.text)];
  for (const attachment of event.attachments ?? []) {
    values.push(
      asText(attachment.title),
      asText(attachment.fallback),
      asText(attachment.text),
    );
  }
  for (const file of event.files ?? []) {
    values.push(asText(file.name), asText(file.plain_text));
  }
  return values;
}

function valuesAtPath(path: RulePath, event: RawEvent): string[] {
  switch (path.kind) {
    case "all":
      return allFieldValues(event);
    case "text":
      return [asText(event.text)];
    case "alarmName":
      return (event.attachments ?? [])
        .map((attachment) => extractAlarmNameFromTitle(asText(attachment.title)))
        .filter((name) => name !== "");
    case "attachments":
      return (event.attachments ?? []).map((attachment) =>
        asText(attachment[path.field]),
      );
    case "files":
      return (event.files ?? []).map((file) => asText(file[path.field]));
  }
}

/**
 * Evaluates an ordered list of ignore rules. A rule ignores an event when it
 * applies to the environment, its pattern is found at its path, and it is
 * valid at the alarm's timestamp. The first such rule, in declaration
 * order, supplies the reported reason.
 */
export class IgnoreRuleEngine {
  private readonly rules: readonly IgnoreRule[];

  constructor(rules: readonly IgnoreRule[]) {
    this.rules = [...rules];
  }

  getRules(): IgnoreRule[] {
    return [...this.rules];
  }

  evaluate(
    record: AlarmRecord,
    event: RawEvent,
    environment: string,
    timestamp: Date | null = record.timestamp,
  ): IgnoreDecision {
    for (const rule of this.rules) {
      if (
        this.matchesMessage(rule, event, environment) &&
        rule.isValidAt(timestamp)
      ) {
        return { ignored: true, rule, reason: rule.describeReason() };
      }
    }
    return NOT_IGNORED;
  }

  shouldIgnore(
    record: AlarmRecord,
    event: RawEvent,
    environment: string,
    timestamp: Date | null = record.timestamp,
  ): boolean {
    return this.evaluate(record, event, environment, timestamp).ignored;
  }

  ignoreReason(
    record: AlarmRecord,
    event: RawEvent,
    environment: string,
    timestamp: Date | null = record.timestamp,
  ): string | undefined {
    return this.evaluate(record, event, environment, timestamp).reason;
  }

  matchedRule(
    record: AlarmRecord,
    event: RawEvent,
    environment: string,
    timestamp: Date | null = record.timestamp,
  ): IgnoreRule | undefined {
    return this.evaluate(record, event, environment, timestamp).rule;
  }

  /** Structural match only: environment scope and pattern at the rule's path. */
  matchesMessage(rule: IgnoreRule, event: RawEvent, environment: string): boolean {
    if (!rule.appliesToEnvironment(environment)) {
      return false;
    }
    const pattern = rule.expandEnvironmentPlaceholders(environment);
    return valuesAtPath(rule.parsedPath, event).some((value) =>
      containsPattern(pattern, value),
    );
  }
}
