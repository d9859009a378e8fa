import type { RawEvent } from "../src/alarms/types";
import { KpiCollector, ProductAnalysisRunner } from "../src/analysis/kpi";
import { getProductConfig, parseProductsConfig } from "../src/config/reader";
import { ConfigurationError, EventSourceError } from "../src/errors";
import type { EventSource, FetchEventsRequest } from "../src/sources/types";
import { createTestLogger, sendAlarmEvent, tsOf } from "./utils";

class InMemoryEventSource implements EventSource {
  readonly name = "memory";
  readonly requests: FetchEventsRequest[] = [];

  constructor(
    private readonly channels: Record<string, RawEvent[]>,
    private readonly failures: Record<string, Error> = {},
  ) {}

  async fetchEvents(request: FetchEventsRequest): Promise<RawEvent[]> {
    this.requests.push(request);
    const failure = this.failures[request.channelReference];
    if (failure) {
      throw failure;
    }
    return (this.channels[request.channelReference] ?? []).filter((event) => {
      const seconds = Number(event.ts);
      return seconds >= request.window.oldest && seconds <= request.window.latest;
    });
  }
}

const config = parseProductsConfig({
  products: {
    SEND: {
      envs: {
        prod: { slack_channel_id: "C-PROD" },
        uat: { slack_channel_id: "C-UAT" },
      },
      oncall: { slack_channel_id: "C-ONCALL", pattern: "^oncall-" },
      alarms: { ignore: [{ name: "Disk" }] },
    },
    INTEROP: {
      envs: { test: { slack_channel_id: "C-BROKEN" } },
    },
  },
});

const channels: Record<string, RawEvent[]> = {
  "C-PROD": [
    sendAlarmEvent({ id: "1", name: "DB-Timeout", at: "2025-01-01T10:00:00Z" }),
    sendAlarmEvent({ id: "2", name: "Disk-Full", at: "2025-01-01T11:00:00Z" }),
    // after 18:00 in Rome, belongs to the next shift day
    sendAlarmEvent({ id: "3", name: "DB-Timeout", at: "2025-01-01T20:00:00Z" }),
  ],
  "C-ONCALL": [
    // 06:00 and 14:00 in Rome
    sendAlarmEvent({ id: "4", name: "oncall-db", at: "2025-01-01T05:00:00Z" }),
    sendAlarmEvent({ id: "5", name: "oncall-db", at: "2025-01-01T13:00:00Z" }),
  ],
};

describe("KpiCollector", () => {
  test("should collect one snapshot per product, environment and day", async () => {
    const source = new InMemoryEventSource(channels, {
      "C-BROKEN": new EventSourceError("timeout", "C-BROKEN"),
    });
    const collector = new KpiCollector(config, source, createTestLogger());

    const kpi = await collector.collect(["01-01-25"]);

    expect(kpi).toEqual({
      SEND: {
        prod: {
          "01-01-25": {
            totalAlarms: 4,
            analyzableAlarms: 3,
            ignoredAlarms: 1,
            oncallTotal: 2,
            oncallInReperibilita: 1,
          },
        },
        uat: {
          "01-01-25": {
            totalAlarms: 0,
            analyzableAlarms: 0,
            ignoredAlarms: 0,
            oncallTotal: null,
            oncallInReperibilita: null,
          },
        },
      },
      INTEROP: {
        test: { "01-01-25": null },
      },
    });
  });

  test("should fetch each alarm type from its channel and window", async () => {
    const source = new InMemoryEventSource(channels);
    const runner = new ProductAnalysisRunner(config, source, createTestLogger());

    await runner.analyzeDate(getProductConfig(config, "SEND"), "prod", "01-01-25");

    expect(source.requests).toEqual([
      {
        channelReference: "C-PROD",
        window: {
          oldest: Number(tsOf("2024-12-31T17:00:00Z")),
          latest: Number(tsOf("2025-01-01T17:00:00Z")),
        },
      },
      {
        channelReference: "C-ONCALL",
        window: {
          oldest: Number(tsOf("2024-12-31T23:00:00Z")),
          latest: Number(tsOf("2025-01-01T23:00:00Z")) - 0.000001,
        },
      },
    ]);
  });

  test("should abort on configuration errors", async () => {
    const source = new InMemoryEventSource(channels, {
      "C-PROD": new ConfigurationError("broken channel", "envs"),
    });
    const collector = new KpiCollector(config, source, createTestLogger());

    await expect(collector.collect(["01-01-25"])).rejects.toThrow(
      ConfigurationError,
    );
  });

  test("should keep other days when one day fails", async () => {
    let calls = 0;
    const flaky: EventSource = {
      name: "flaky",
      async fetchEvents() {
        calls++;
        if (calls === 1) {
          throw new Error("connection reset");
        }
        return [];
      },
    };
    const uatOnly = parseProductsConfig({
      products: { SEND: { envs: { uat: { slack_channel_id: "C-UAT" } } } },
    });
    const collector = new KpiCollector(uatOnly, flaky, createTestLogger());

    const kpi = await collector.collect(["01-01-25", "02-01-25"]);

    expect(kpi.SEND.uat["01-01-25"]).toBeNull();
    expect(kpi.SEND.uat["02-01-25"]).toEqual({
      totalAlarms: 0,
      analyzableAlarms: 0,
      ignoredAlarms: 0,
      oncallTotal: null,
      oncallInReperibilita: null,
    });
  });
});
