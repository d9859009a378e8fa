import { getEveningWindow, getOnCallWindow } from "./timeWindows";
import {
  type AlarmCategory,
  type TimeWindow,
  DEFAULT_TIMEZONE,
} from "./types";
import type { ProductConfig } from "../config/types";
import { ConfigurationError } from "../errors";

export interface AlarmTypeDefinition {
  product: string;
  environment: string;
  category: AlarmCategory;
  channelReference: string;
  pattern: string;
  description: string;
}

export function compileAlarmPattern(pattern: string, field = "pattern"): RegExp {
  try {
    return new RegExp(pattern, "i");
  } catch (error) {
    throw new ConfigurationError(
      `Invalid regular expression '${pattern}': ${error instanceof Error ? error.message : String(error)}`,
      field,
    );
  }
}

/**
 * Pattern matching every name the on-call pattern does not find anywhere,
 * so that normal and on-call alarm types never both match a name.
 */
export function excludingPattern(oncallPattern: string): string {
  return `^(?![\\s\\S]*?(?:${oncallPattern}))`;
}

export class AlarmType {
  readonly product: string;
  readonly environment: string;
  readonly category: AlarmCategory;
  readonly channelReference: string;
  readonly pattern: string;
  readonly description: string;
  private readonly namePattern: RegExp;

  constructor(definition: AlarmTypeDefinition) {
    this.product = definition.product;
    this.environment = definition.environment;
    this.category = definition.category;
    this.channelReference = definition.channelReference;
    this.pattern = definition.pattern;
    this.description = definition.description;
    this.namePattern = compileAlarmPattern(definition.pattern);
  }

  /** Case-insensitive search of the name pattern anywhere in `name`. */
  matches(name: string): boolean {
    if (!name) {
      return false;
    }
    return this.namePattern.test(name);
  }

  isOnCall(): boolean {
    return this.category === "oncall";
  }

  isNormal(): boolean {
    return this.category === "normal";
  }

  getTimeWindow(dateArgument: string, tz: string = DEFAULT_TIMEZONE): TimeWindow {
    return this.isOnCall()
      ? getOnCallWindow(dateArgument, tz)
      : getEveningWindow(dateArgument, tz);
  }

  toString(): string {
    return `AlarmType(${this.product}/${this.environment}/${this.category})`;
  }
}

/**
 * One normal type per environment, plus an on-call type for prod when the
 * product defines an on-call pattern.
 */
export function buildAlarmTypes(
  productConfig: ProductConfig,
  environment: string,
): AlarmType[] {
  const environmentConfig = productConfig.environments.get(environment);
  if (!environmentConfig) {
    throw new ConfigurationError(
      `Environment '${environment}' is not defined for product '${productConfig.name}'`,
      "envs",
    );
  }

  const oncall = productConfig.oncall;
  const alarmTypes = [
    new AlarmType({
      product: productConfig.name,
      environment,
      category: "normal",
      channelReference: environmentConfig.channelReference,
      pattern: oncall ? excludingPattern(oncall.pattern) : ".*",
      description: `${productConfig.name} ${environment} normal alarms`,
    }),
  ];

  if (environment === "prod" && oncall) {
    alarmTypes.push(
      new AlarmType({
        product: productConfig.name,
        environment,
        category: "oncall",
        channelReference: oncall.channelReference,
        pattern: oncall.pattern,
        description: `${productConfig.name} ${environment} oncall alarms`,
      }),
    );
  }

  return alarmTypes;
}
