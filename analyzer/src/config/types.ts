import type { IgnoreRule } from "../rules/ignoreRule";

export interface EnvironmentConfig {
  readonly name: string;
  readonly channelReference: string;
}

export interface OnCallConfig {
  readonly channelReference: string;
  readonly pattern: string;
}

export interface ProductConfig {
  readonly name: string;
  readonly environments: ReadonlyMap<string, EnvironmentConfig>;
  readonly ignoreRules: readonly IgnoreRule[];
  readonly oncall?: OnCallConfig;
}

export interface BusinessHours {
  // local hours, [start, end)
  readonly start: number;
  readonly end: number;
}

export interface AnalyzerConfig {
  readonly timezone: string;
  readonly businessHours: BusinessHours;
  readonly products: ReadonlyMap<string, ProductConfig>;
}

export const DEFAULT_BUSINESS_HOURS: BusinessHours = Object.freeze({
  start: 9,
  end: 18,
});
