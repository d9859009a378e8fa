#!/usr/bin/env node

import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";

import { type Command, program } from "commander";
import { type Logger } from "winston";

import { getLookbackWindow, expandDateRange } from "./alarms/timeWindows";
import { KpiCollector, ProductAnalysisRunner } from "./analysis/kpi";
import { computeAlarmDurations, parseOpenClosingPairs } from "./analysis/durations";
import { rankAlarms, toAnalysisSummary } from "./analysis/statistics";
import {
  DEFAULT_PRODUCTS_CONFIG_PATH,
  getProductConfig,
  loadProductsConfig,
  validateProductsConfig,
} from "./config/reader";
import type { AnalyzerConfig } from "./config/types";
import { ConfigurationError } from "./errors";
import { FileEventSource } from "./sources/fileEventSource";
import type { AnalyzerRunnerConfig } from "./types";
import { getConfig, mergeConfig } from "./utils/config";
import { createOrderedLogger } from "./utils/logger";

interface CommonOptions {
  config?: string;
  productsConfig?: string;
  eventsDir?: string;
  outputDir?: string;
  logLevel?: string;
  logDir?: string;
  timezone?: string;
}

interface RunnerContext {
  runnerConfig: AnalyzerRunnerConfig;
  analyzerConfig: AnalyzerConfig;
  source: FileEventSource;
  logger: Logger;
}

async function setupRunner(options: CommonOptions): Promise<RunnerContext> {
  const { config: fileAndEnvConfig } = await getConfig({
    configPath: options.config,
  });

  const cliConfig: AnalyzerRunnerConfig = {
    logLevel: options.logLevel
      ? { console: options.logLevel, file: "debug" }
      : undefined,
    logDir: options.logDir,
    productsConfigPath: options.productsConfig,
    eventsDir: options.eventsDir,
    outputDir: options.outputDir,
    timezone: options.timezone,
  };

  const finalConfig = mergeConfig(fileAndEnvConfig, cliConfig);

  const logDir =
    finalConfig.logDir ||
    path.join(os.tmpdir(), `alarm-analyzer-logs-${Date.now()}`);
  finalConfig.logDir = logDir;
  const logLevel = finalConfig.logLevel || { console: "info", file: "debug" };
  finalConfig.logLevel = logLevel;
  const logger = createOrderedLogger({
    consoleLevel: logLevel.console,
    fileLevel: logLevel.file,
    filePath: path.join(logDir, "alarm-analyzer.log"),
  });

  const analyzerConfig = await loadProductsConfig(
    finalConfig.productsConfigPath || DEFAULT_PRODUCTS_CONFIG_PATH,
    finalConfig.timezone,
  );

  for (const problem of validateProductsConfig(analyzerConfig)) {
    logger.warn(problem);
  }

  const source = new FileEventSource(
    finalConfig.eventsDir || path.join(process.cwd(), "events"),
    logger,
  );

  return { runnerConfig: finalConfig, analyzerConfig, source, logger };
}

async function writeOutput(
  outputDir: string | undefined,
  fileName: string,
  data: unknown,
  logger: Logger,
): Promise<void> {
  if (!outputDir) {
    return;
  }
  await fs.mkdir(outputDir, { recursive: true });
  const outputPath = path.join(outputDir, fileName);
  await fs.writeFile(outputPath, JSON.stringify(data, null, 2));
  logger.info(`Results written to ${outputPath}`);
}

async function analyzeCommand(
  options: CommonOptions & { date: string; product: string; env: string },
): Promise<void> {
  try {
    const { runnerConfig, analyzerConfig, source, logger } =
      await setupRunner(options);
    const productConfig = getProductConfig(analyzerConfig, options.product);

    const runner = new ProductAnalysisRunner(analyzerConfig, source, logger);
    const result = await runner.analyzeDate(
      productConfig,
      options.env,
      options.date,
    );

    logger.info(`Analysis of ${options.product}/${options.env} ${options.date}`, {
      total: result.totalAlarms,
      analyzable: result.analyzableAlarms,
      ignored: result.ignoredAlarms,
      oncallTotal: result.oncallTotal,
      oncallInReperibilita: result.oncallInReperibilita,
    });
    for (const [name, alarms] of rankAlarms(result.alarmStats)) {
      logger.info(`${name}: ${alarms.length}`);
    }

    await writeOutput(
      runnerConfig.outputDir,
      "results.json",
      toAnalysisSummary(result, analyzerConfig.timezone),
      logger,
    );
  } catch (error) {
    console.error("Error running analysis:", error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

async function kpiCommand(options: CommonOptions & { date: string }): Promise<void> {
  try {
    const dates = expandDateRange(options.date);
    const { runnerConfig, analyzerConfig, source, logger } =
      await setupRunner(options);

    const collector = new KpiCollector(analyzerConfig, source, logger);
    const kpiData = await collector.collect(dates);

    await writeOutput(
      runnerConfig.outputDir,
      "kpi.json",
      { dateRange: options.date, dates, products: kpiData },
      logger,
    );
  } catch (error) {
    console.error("Error collecting KPIs:", error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

async function durationsCommand(
  options: CommonOptions & { product: string; env: string; daysBack: string },
): Promise<void> {
  try {
    const now = new Date();
    const window = getLookbackWindow(Number(options.daysBack), now);
    const { runnerConfig, analyzerConfig, source, logger } =
      await setupRunner(options);
    const productConfig = getProductConfig(analyzerConfig, options.product);
    const environment = productConfig.environments.get(options.env);
    if (!environment) {
      throw new ConfigurationError(
        `Environment '${options.env}' is not defined for product '${options.product}'`,
        "envs",
      );
    }

    const events = await source.fetchEvents({
      channelReference: environment.channelReference,
      window,
    });
    const durations = computeAlarmDurations(parseOpenClosingPairs(events), now);

    const stillOpen = durations.filter((duration) => !duration.closedAt).length;
    logger.info(`Found ${durations.length} opened alarms`, {
      closed: durations.length - stillOpen,
      open: stillOpen,
    });

    await writeOutput(
      runnerConfig.outputDir,
      "durations.json",
      durations.map((duration) => ({
        ...duration,
        openedAt: duration.openedAt.toISOString(),
        closedAt: duration.closedAt ? duration.closedAt.toISOString() : null,
      })),
      logger,
    );
  } catch (error) {
    console.error("Error computing durations:", error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

function withCommonOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "Path to JSON runner configuration file")
    .option("--products-config <path>", "Path to the products YAML file")
    .option("--events-dir <path>", "Directory holding exported channel events")
    .option("--output-dir <path>", "Output directory for JSON results")
    .option("--log-level <level>", "Log level (error|warn|info|debug|silly)")
    .option("--log-dir <path>", "Directory for log files")
    .option("--timezone <tz>", "Reference timezone (e.g., Europe/Rome)");
}

async function main(): Promise<void> {
  program
    .name("alarm-analyzer")
    .description("Alarm classification and ignore-rule evaluation toolkit")
    .version("0.1.0");

  withCommonOptions(
    program
      .command("analyze")
      .description("Analyze the alarms of one product environment")
      .requiredOption("-d, --date <date>", "Date or range (DD-MM-YY[:DD-MM-YY])")
      .requiredOption("-p, --product <product>", "Product name")
      .option("-e, --env <env>", "Environment", "prod"),
  ).action(analyzeCommand);

  withCommonOptions(
    program
      .command("kpi")
      .description("Collect daily KPIs for every product and environment")
      .requiredOption("-d, --date <date>", "Date or range (DD-MM-YY[:DD-MM-YY])"),
  ).action(kpiCommand);

  withCommonOptions(
    program
      .command("durations")
      .description("Pair alarm openings and closings and report durations")
      .requiredOption("-p, --product <product>", "Product name")
      .option("-e, --env <env>", "Environment", "prod")
      .option("--days-back <days>", "Days to look back (1-30)", "7"),
  ).action(durationsCommand);

  await program.parseAsync();
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Unhandled error:", error);
    process.exit(1);
  });
}
