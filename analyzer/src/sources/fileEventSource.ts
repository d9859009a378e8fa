import { promises as fs } from "fs";
import * as path from "path";

import { glob as globby } from "tinyglobby";
import { type Logger } from "winston";
import { z } from "zod";

import type { EventSource, FetchEventsRequest } from "./types";
import { type RawEvent, parseEventTimestamp } from "../alarms/types";
import { EventSourceError } from "../errors";

const rawEventSchema = z
  .object({
    text: z.string().optional(),
    ts: z.union([z.string(), z.number()]).optional(),
    attachments: z
      .array(
        z
          .object({
            title: z.string().optional(),
            fallback: z.string().optional(),
            text: z.string().optional(),
          })
          .passthrough(),
      )
      .optional(),
    files: z
      .array(
        z
          .object({
            id: z.string().optional(),
            name: z.string().optional(),
            plain_text: z.string().optional(),
          })
          .passthrough(),
      )
      .optional(),
  })
  .passthrough();

// an exported file holds either a bare list or a history page
const exportFileSchema = z.union([
  z.array(rawEventSchema),
  z.object({ messages: z.array(rawEventSchema) }).passthrough(),
]);

/**
 * Reads events exported as JSON files under `<baseDir>/<channelReference>/`.
 * Events outside the requested window (inclusive) are dropped; undated
 * events are kept, as a live history fetch would have returned them.
 */
export class FileEventSource implements EventSource {
  readonly name = "file";

  constructor(
    private readonly baseDir: string,
    private readonly logger: Logger,
  ) {
    this.logger = logger.child({ module: "FileEventSource" });
  }

  async fetchEvents(request: FetchEventsRequest): Promise<RawEvent[]> {
    const channelDir = path.join(this.baseDir, request.channelReference);
    try {
      await fs.access(channelDir);
    } catch (error) {
      throw new EventSourceError(
        `no export directory at ${channelDir}`,
        request.channelReference,
        error,
      );
    }

    const files = await globby("**/*.json", { cwd: channelDir, absolute: true });
    files.sort();

    const events: RawEvent[] = [];
    for (const file of files) {
      events.push(...(await this.readExportFile(file, request.channelReference)));
    }

    const inWindow = events.filter((event) => {
      const timestamp = parseEventTimestamp(event.ts);
      if (!timestamp) {
        return true;
      }
      const seconds = timestamp.getTime() / 1000;
      return seconds >= request.window.oldest && seconds <= request.window.latest;
    });

    this.logger.debug(`Loaded ${inWindow.length} events`, {
      channel: request.channelReference,
      files: files.length,
      skipped: events.length - inWindow.length,
    });

    return inWindow;
  }

  private async readExportFile(
    file: string,
    channelReference: string,
  ): Promise<RawEvent[]> {
    let data: unknown;
    try {
      data = JSON.parse(await fs.readFile(file, "utf-8"));
    } catch (error) {
      throw new EventSourceError(
        `cannot read ${file}: ${error instanceof Error ? error.message : "Unknown error"}`,
        channelReference,
        error,
      );
    }

    const parsed = exportFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new EventSourceError(
        `${file} is not an event export: ${parsed.error.issues[0].message}`,
        channelReference,
      );
    }
    return Array.isArray(parsed.data) ? parsed.data : parsed.data.messages;
  }
}
