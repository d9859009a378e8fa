import { promises as fs } from "fs";
import * as path from "path";

import * as dotenv from "dotenv";
import { z } from "zod";

import { ConfigParseError } from "../errors";
import type { AnalyzerRunnerConfig } from "../types";

export interface ConfigLoadOptions {
  configPath?: string;
  envPath?: string;
  workingDir?: string;
}

const runnerConfigSchema = z
  .object({
    logLevel: z.object({ console: z.string(), file: z.string() }).optional(),
    logDir: z.string().optional(),
    productsConfigPath: z.string().optional(),
    eventsDir: z.string().optional(),
    outputDir: z.string().optional(),
    timezone: z.string().optional(),
  })
  .strict();

export async function loadConfig(
  options: ConfigLoadOptions = {},
): Promise<AnalyzerRunnerConfig> {
  const workingDir = options.workingDir || process.cwd();
  const configPath =
    options.configPath || path.join(workingDir, ".config.json");

  let configData: string;
  try {
    configData = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (options.configPath) {
      throw new ConfigParseError(
        `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
        configPath,
      );
    }
    // no explicit config path and no default file
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(configData);
  } catch (error) {
    throw new ConfigParseError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      configPath,
    );
  }

  const parsed = runnerConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigParseError(issue.message, configPath, issue.path.join("."));
  }

  // paths are relative to the config file directory
  const configDir = path.dirname(path.resolve(configPath));
  return resolvePaths(parsed.data, configDir);
}

export function resolvePaths(
  config: AnalyzerRunnerConfig,
  baseDir: string,
): AnalyzerRunnerConfig {
  const resolvedConfig = { ...config };
  const resolvePath = (filePath: string): string => {
    return path.isAbsolute(filePath)
      ? filePath
      : path.resolve(baseDir, filePath);
  };

  if (config.logDir) {
    resolvedConfig.logDir = resolvePath(config.logDir);
  }

  if (config.productsConfigPath) {
    resolvedConfig.productsConfigPath = resolvePath(config.productsConfigPath);
  }

  if (config.eventsDir) {
    resolvedConfig.eventsDir = resolvePath(config.eventsDir);
  }

  if (config.outputDir) {
    resolvedConfig.outputDir = resolvePath(config.outputDir);
  }

  return resolvedConfig;
}

export function loadEnv(options: ConfigLoadOptions = {}): NodeJS.ProcessEnv {
  const workingDir = options.workingDir || process.cwd();
  const envPath = options.envPath || path.join(workingDir, ".env");

  const result = dotenv.config({ path: envPath });

  if (result.error && options.envPath) {
    throw new ConfigParseError(
      `Failed to load env file: ${result.error.message}`,
      envPath,
    );
  }

  return process.env;
}

/**
 * Settings taken from `ALARM_ANALYZER_*` environment variables; they sit
 * between the config file and CLI options.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): AnalyzerRunnerConfig {
  const config: AnalyzerRunnerConfig = {};
  if (env.ALARM_ANALYZER_PRODUCTS_CONFIG) {
    config.productsConfigPath = path.resolve(env.ALARM_ANALYZER_PRODUCTS_CONFIG);
  }
  if (env.ALARM_ANALYZER_EVENTS_DIR) {
    config.eventsDir = path.resolve(env.ALARM_ANALYZER_EVENTS_DIR);
  }
  if (env.ALARM_ANALYZER_TIMEZONE) {
    config.timezone = env.ALARM_ANALYZER_TIMEZONE;
  }
  return config;
}

/** Later configs win; undefined values never override. */
export function mergeConfig(
  ...configs: AnalyzerRunnerConfig[]
): AnalyzerRunnerConfig {
  const merged: AnalyzerRunnerConfig = {};
  for (const config of configs) {
    if (config.logLevel !== undefined) merged.logLevel = config.logLevel;
    if (config.logDir !== undefined) merged.logDir = config.logDir;
    if (config.productsConfigPath !== undefined) {
      merged.productsConfigPath = config.productsConfigPath;
    }
    if (config.eventsDir !== undefined) merged.eventsDir = config.eventsDir;
    if (config.outputDir !== undefined) merged.outputDir = config.outputDir;
    if (config.timezone !== undefined) merged.timezone = config.timezone;
  }
  return merged;
}

export async function getConfig(options: ConfigLoadOptions = {}): Promise<{
  config: AnalyzerRunnerConfig;
  env: NodeJS.ProcessEnv;
}> {
  const fileConfig = await loadConfig(options);
  const env = loadEnv(options);

  return { config: mergeConfig(fileConfig, configFromEnv(env)), env };
}
