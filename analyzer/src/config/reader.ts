import { promises as fs } from "fs";

import { CORE_SCHEMA, load as yamlLoad } from "js-yaml";

import {
  type IgnoreRuleEntry,
  type ProductsFile,
  type TimeConstraintEntry,
  productsFileSchema,
} from "./schema";
import {
  type AnalyzerConfig,
  type EnvironmentConfig,
  type ProductConfig,
  DEFAULT_BUSINESS_HOURS,
} from "./types";
import { compileAlarmPattern } from "../alarms/alarmType";
import { hasMessageExtractor } from "../alarms/extractors";
import { assertValidBusinessHours } from "../alarms/onCall";
import { DEFAULT_TIMEZONE } from "../alarms/types";
import { ConfigParseError, ConfigurationError } from "../errors";
import { DEFAULT_IGNORE_RULES, IgnoreRule } from "../rules/ignoreRule";
import { TimeConstraint } from "../rules/timeConstraint";
import { isValidTimezone } from "../utils/time";

export const DEFAULT_PRODUCTS_CONFIG_PATH = "config/base.yaml";

function withField<T>(field: string, build: () => T): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      const inner = error.field ? `${field}.${error.field}` : field;
      throw new ConfigurationError(error.detail, inner);
    }
    throw error;
  }
}

function buildTimeConstraint(
  entry: TimeConstraintEntry | undefined,
  tz: string,
): TimeConstraint {
  return new TimeConstraint(entry ?? {}, tz);
}

function buildIgnoreRule(entry: IgnoreRuleEntry, tz: string): IgnoreRule {
  if (!entry.name) {
    throw new ConfigurationError("Ignore rule name cannot be empty", "name");
  }
  return new IgnoreRule({
    pattern: entry.name,
    path: entry.path,
    environments: entry.environments,
    reason: entry.reason,
    validity: withField("validity", () => buildTimeConstraint(entry.validity, tz)),
    exclusions: withField("exclusions", () =>
      buildTimeConstraint(entry.exclusions, tz),
    ),
  });
}

function buildProduct(
  name: string,
  data: ProductsFile["products"][string],
  tz: string,
): ProductConfig {
  if (!hasMessageExtractor(name)) {
    throw new ConfigurationError(
      `No message extractor available for product '${name}'`,
      `products.${name}`,
    );
  }

  const environments = new Map<string, EnvironmentConfig>();
  for (const [envName, envData] of Object.entries(data.envs)) {
    environments.set(envName, {
      name: envName,
      channelReference: envData.slack_channel_id,
    });
  }

  const ignoreEntries = data.alarms.ignore;
  const ignoreRules = ignoreEntries
    ? ignoreEntries.map((entry, index) =>
        withField(`products.${name}.alarms.ignore[${index}]`, () =>
          buildIgnoreRule(entry, tz),
        ),
      )
    : DEFAULT_IGNORE_RULES;

  let oncall: ProductConfig["oncall"];
  if (data.oncall) {
    compileAlarmPattern(data.oncall.pattern, `products.${name}.oncall.pattern`);
    oncall = {
      channelReference: data.oncall.slack_channel_id,
      pattern: data.oncall.pattern,
    };
  }

  return { name, environments, ignoreRules, oncall };
}

/**
 * Turns parsed configuration data into immutable domain objects. Every rule,
 * pattern and time bound is checked here, before any event is processed.
 *
 * A `timezoneOverride` replaces the file's `timezone` for every time bound,
 * window and business hours check.
 */
export function parseProductsConfig(
  data: unknown,
  source = "<inline>",
  timezoneOverride?: string,
): AnalyzerConfig {
  const parsed = productsFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigParseError(issue.message, source, issue.path.join("."));
  }

  const tz = timezoneOverride ?? parsed.data.timezone ?? DEFAULT_TIMEZONE;
  if (!isValidTimezone(tz)) {
    throw new ConfigurationError(`Unknown timezone '${tz}'`, "timezone");
  }

  const businessHours = parsed.data.business_hours ?? DEFAULT_BUSINESS_HOURS;
  assertValidBusinessHours(businessHours);

  const products = new Map<string, ProductConfig>();
  for (const [name, productData] of Object.entries(parsed.data.products)) {
    products.set(name, buildProduct(name, productData, tz));
  }

  return { timezone: tz, businessHours, products };
}

export function parseProductsYaml(
  content: string,
  filePath: string,
  timezoneOverride?: string,
): AnalyzerConfig {
  let data: unknown;
  try {
    // core schema keeps unquoted dates as strings
    data = yamlLoad(content, { schema: CORE_SCHEMA });
  } catch (error) {
    throw new ConfigParseError(
      `Invalid YAML: ${error instanceof Error ? error.message : "Unknown error"}`,
      filePath,
    );
  }

  if (typeof data !== "object" || data === null) {
    throw new ConfigParseError("YAML root must be an object", filePath);
  }

  return parseProductsConfig(data, filePath, timezoneOverride);
}

export async function loadProductsConfig(
  filePath: string = DEFAULT_PRODUCTS_CONFIG_PATH,
  timezoneOverride?: string,
): Promise<AnalyzerConfig> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigParseError(
      `Failed to read configuration file: ${error instanceof Error ? error.message : "Unknown error"}`,
      filePath,
    );
  }
  return parseProductsYaml(content, filePath, timezoneOverride);
}

export function getProductConfig(
  config: AnalyzerConfig,
  product: string,
): ProductConfig {
  const productConfig = config.products.get(product);
  if (!productConfig) {
    throw new ConfigurationError(
      `Unknown product '${product}'. Expected one of: ${[...config.products.keys()].join(", ")}`,
      "product",
    );
  }
  return productConfig;
}

/** Non-fatal problems worth reporting to the operator. */
export function validateProductsConfig(config: AnalyzerConfig): string[] {
  const problems: string[] = [];
  for (const [name, product] of config.products) {
    if (product.environments.size === 0) {
      problems.push(`Product '${name}' has no environments defined`);
    }
    for (const [envName, env] of product.environments) {
      if (!env.channelReference) {
        problems.push(
          `Product '${name}', environment '${envName}' has empty slack_channel_id`,
        );
      }
    }
  }
  return problems;
}
