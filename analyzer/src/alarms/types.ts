// Raw events follow the chat history wire format, hence the snake_case keys.
export interface RawAttachment {
  title?: string;
  fallback?: string;
  text?: string;
  [field: string]: unknown;
}

export interface RawFile {
  id?: string;
  name?: string;
  plain_text?: string;
  [field: string]: unknown;
}

export interface RawEvent {
  text?: string;
  ts?: string | number;
  attachments?: RawAttachment[];
  files?: RawFile[];
  [field: string]: unknown;
}

export interface AlarmRecord {
  readonly id: string;
  readonly name: string;
  readonly location: string;
  readonly timestamp: Date | null;
  readonly rawText: string;
}

export type AlarmCategory = "normal" | "oncall";

/** Epoch seconds, both ends inclusive. */
export interface TimeWindow {
  oldest: number;
  latest: number;
}

export const DEFAULT_TIMEZONE = "Europe/Rome";

const EPOCH_SECONDS = /^\d+(\.\d+)?$/;

/** Converts an event `ts` (seconds since epoch, usually a string) to a Date. */
export function parseEventTimestamp(ts: RawEvent["ts"]): Date | null {
  if (ts === undefined || ts === null) {
    return null;
  }
  if (typeof ts === "string" && !EPOCH_SECONDS.test(ts.trim())) {
    return null;
  }
  const seconds = typeof ts === "number" ? ts : Number(ts.trim());
  if (!Number.isFinite(seconds)) {
    return null;
  }
  return new Date(seconds * 1000);
}
