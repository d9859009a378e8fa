import { CLOSING_PATTERN, OPENING_PATTERN } from "../alarms/extractors";
import { type RawEvent, parseEventTimestamp } from "../alarms/types";

export interface AlarmOpening {
  name: string;
  openedAt: Date;
}

export interface OpenClosingPairs {
  // keyed by alarm id, first occurrence wins
  openings: Map<string, AlarmOpening>;
  closings: Map<string, Date>;
}

export interface AlarmDuration {
  id: string;
  name: string;
  openedAt: Date;
  closedAt: Date | null;
  durationSeconds: number;
}

function eventTexts(event: RawEvent, fields: Array<"title" | "fallback" | "text">): string[] {
  const texts: string[] = [];
  if (event.text) {
    texts.push(event.text);
  }
  for (const attachment of event.attachments ?? []) {
    for (const field of fields) {
      const value = attachment[field];
      if (value) texts.push(value);
    }
  }
  return texts;
}

function firstMatch(pattern: RegExp, texts: string[]): RegExpExecArray | null {
  for (const text of texts) {
    const match = pattern.exec(text);
    if (match) return match;
  }
  return null;
}

/** Collects alarm openings and closings by id; undated events are skipped. */
export function parseOpenClosingPairs(events: readonly RawEvent[]): OpenClosingPairs {
  const openings = new Map<string, AlarmOpening>();
  const closings = new Map<string, Date>();

  for (const event of events) {
    const timestamp = parseEventTimestamp(event.ts);
    if (!timestamp) {
      continue;
    }

    const closing = firstMatch(CLOSING_PATTERN, eventTexts(event, ["fallback", "text"]));
    if (closing) {
      if (!closings.has(closing[1])) {
        closings.set(closing[1], timestamp);
      }
      continue;
    }

    const opening = firstMatch(
      OPENING_PATTERN,
      eventTexts(event, ["title", "fallback", "text"]),
    );
    if (opening && !openings.has(opening[1])) {
      openings.set(opening[1], { name: opening[2], openedAt: timestamp });
    }
  }

  return { openings, closings };
}

/** One entry per opened alarm, longest first; open alarms are measured up to `now`. */
export function computeAlarmDurations(
  pairs: OpenClosingPairs,
  now: Date = new Date(),
): AlarmDuration[] {
  const durations: AlarmDuration[] = [];
  for (const [id, opening] of pairs.openings) {
    const closedAt = pairs.closings.get(id) ?? null;
    const end = closedAt ?? now;
    durations.push({
      id,
      name: opening.name,
      openedAt: opening.openedAt,
      closedAt,
      durationSeconds: (end.getTime() - opening.openedAt.getTime()) / 1000,
    });
  }
  return durations.sort((a, b) => b.durationSeconds - a.durationSeconds);
}
