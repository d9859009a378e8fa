import { type Logger } from "winston";

import type { ProductConfig } from "../src/config/types";
import type { RawEvent } from "../src/alarms/types";
import type { IgnoreRule } from "../src/rules/ignoreRule";
import { createOrderedLogger } from "../src/utils/logger";

export function createTestLogger(): Logger {
  return createOrderedLogger({ consoleLevel: "error", silent: true });
}

/** Event `ts` (epoch seconds as a string) for an ISO instant. */
export function tsOf(iso: string): string {
  return String(Date.parse(iso) / 1000);
}

export function sendAlarmEvent(options: {
  id: string;
  name: string;
  at?: string;
  location?: string;
  fallback?: string;
}): RawEvent {
  const title = `#${options.id}: ALARM: "${options.name}" in ${options.location ?? "EU (Milan)"}`;
  return {
    ts: options.at ? tsOf(options.at) : undefined,
    attachments: [
      {
        title,
        fallback: options.fallback ?? title,
      },
    ],
  };
}

export function interopAlarmEvent(options: {
  id?: string;
  name: string;
  at?: string;
  location?: string;
  plainText?: string;
}): RawEvent {
  return {
    ts: options.at ? tsOf(options.at) : undefined,
    files: [
      {
        id: options.id,
        name: `ALARM: "${options.name}" in ${options.location ?? "EU (Milan)"}`,
        plain_text: options.plainText ?? "",
      },
    ],
  };
}

export function sendProductConfig(
  overrides: Partial<ProductConfig> = {},
  ignoreRules: readonly IgnoreRule[] = [],
): ProductConfig {
  return {
    name: "SEND",
    environments: new Map([
      ["prod", { name: "prod", channelReference: "C-PROD" }],
      ["uat", { name: "uat", channelReference: "C-UAT" }],
    ]),
    ignoreRules,
    oncall: { channelReference: "C-ONCALL", pattern: "^oncall-" },
    ...overrides,
  };
}
