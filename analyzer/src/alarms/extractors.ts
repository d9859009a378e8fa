import {
  type AlarmRecord,
  type RawEvent,
  parseEventTimestamp,
} from "./types";
import { ConfigurationError } from "../errors";

// "#45533: ALARM: "AlarmName" in Location"
export const OPENING_PATTERN = /#(\d+): ALARM: "([^"]+)" in (.+)/;
export const CLOSING_PATTERN =
  /CloudWatch closed alert .*?\|#(\d+)> "ALARM:\s*"([^"]+)"\s*in\s+([^"]+)"/;

const QUOTED_NAME = /"([^"]+)"/;
const LOCATION = /\bin\s+(.+)/;

export type ExtractionStrategy = "attachmentTitle" | "fileAttachment";

export interface MessageExtractor {
  readonly product: string;
  readonly environment: string;
  readonly strategy: ExtractionStrategy;
  extract(event: RawEvent): AlarmRecord | null;
}

/** Alarm name from an opening title, or "" when the title is not one. */
export function extractAlarmNameFromTitle(title: string | undefined): string {
  if (!title) {
    return "";
  }
  return OPENING_PATTERN.exec(title)?.[2] ?? "";
}

function extractFromAttachmentTitle(event: RawEvent): AlarmRecord | null {
  const attachment = event.attachments?.[0];
  if (!attachment) {
    return null;
  }

  const title = attachment.title ?? "";
  const fallback = attachment.fallback ?? "";
  const match = OPENING_PATTERN.exec(title) ?? OPENING_PATTERN.exec(fallback);
  if (!match) {
    return null;
  }

  return {
    id: match[1],
    name: match[2],
    location: match[3],
    timestamp: parseEventTimestamp(event.ts),
    rawText: fallback,
  };
}

function extractFromFileAttachment(event: RawEvent): AlarmRecord | null {
  const file = event.files?.[0];
  if (!file) {
    return null;
  }

  const rawName = file.name ?? "";
  const quoted = QUOTED_NAME.exec(rawName);
  // look for the location after the quoted name, so " in " inside it is skipped
  const locationSource = quoted
    ? rawName.slice(quoted.index + quoted[0].length)
    : rawName;
  const location = LOCATION.exec(locationSource)?.[1].trim() || "Unknown";

  return {
    id: file.id ?? "N/A",
    name: quoted ? quoted[1] : rawName,
    location,
    timestamp: parseEventTimestamp(event.ts),
    rawText: file.plain_text ?? "",
  };
}

function createExtractor(
  product: string,
  environment: string,
  strategy: ExtractionStrategy,
): MessageExtractor {
  const extract =
    strategy === "attachmentTitle"
      ? extractFromAttachmentTitle
      : extractFromFileAttachment;
  return Object.freeze({ product, environment, strategy, extract });
}

export const createSendProdExtractor = (): MessageExtractor =>
  createExtractor("SEND", "prod", "attachmentTitle");
export const createSendUatExtractor = (): MessageExtractor =>
  createExtractor("SEND", "uat", "attachmentTitle");
export const createInteropProdExtractor = (): MessageExtractor =>
  createExtractor("INTEROP", "prod", "fileAttachment");
export const createInteropTestExtractor = (): MessageExtractor =>
  createExtractor("INTEROP", "test", "fileAttachment");

const EXTRACTORS = {
  SEND_PROD: createSendProdExtractor(),
  SEND_UAT: createSendUatExtractor(),
  INTEROP_PROD: createInteropProdExtractor(),
  INTEROP_TEST: createInteropTestExtractor(),
} as const satisfies Record<string, MessageExtractor>;

type ExtractorKey = keyof typeof EXTRACTORS;

function isExtractorKey(key: string): key is ExtractorKey {
  return Object.prototype.hasOwnProperty.call(EXTRACTORS, key);
}

function extractorKey(product: string, environment: string): string {
  return `${product.toUpperCase()}_${environment.toUpperCase()}`;
}

export function hasMessageExtractor(product: string, environment = "prod"): boolean {
  return (
    isExtractorKey(extractorKey(product, environment)) ||
    isExtractorKey(extractorKey(product, "prod"))
  );
}

/**
 * Extractor for a product/environment pair. Falls back to the product's
 * prod extractor; a product with none is a configuration error.
 */
export function getMessageExtractor(
  product: string,
  environment: string,
): MessageExtractor {
  const exact = extractorKey(product, environment);
  if (isExtractorKey(exact)) {
    return EXTRACTORS[exact];
  }
  const fallback = extractorKey(product, "prod");
  if (isExtractorKey(fallback)) {
    return EXTRACTORS[fallback];
  }
  throw new ConfigurationError(
    `No message extractor available for product '${product}' (environment '${environment}')`,
    "product",
  );
}

export function getAvailableExtractorKeys(): string[] {
  return Object.keys(EXTRACTORS);
}
