import type { RawEvent, TimeWindow } from "../alarms/types";

export interface FetchEventsRequest {
  channelReference: string;
  window: TimeWindow;
}

/** Transport collaborator delivering raw events of a channel within a window. */
export interface EventSource {
  readonly name: string;
  fetchEvents(request: FetchEventsRequest): Promise<RawEvent[]>;
}
