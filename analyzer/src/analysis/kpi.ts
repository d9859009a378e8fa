import { type Logger } from "winston";

import { AnalysisAggregator } from "./aggregator";
import type { AnalysisResult } from "./types";
import { type AlarmType, buildAlarmTypes } from "../alarms/alarmType";
import { OnCallClassifier } from "../alarms/onCall";
import type { AnalyzerConfig, ProductConfig } from "../config/types";
import { ConfigurationError } from "../errors";
import { IgnoreRuleEngine } from "../rules/ignoreRuleEngine";
import type { EventSource } from "../sources/types";

export interface KpiSnapshot {
  totalAlarms: number;
  analyzableAlarms: number;
  ignoredAlarms: number;
  // only tracked for prod
  oncallTotal: number | null;
  oncallInReperibilita: number | null;
}

/** product -> environment -> DD-MM-YY date -> snapshot, null when the day failed. */
export type KpiData = Record<string, Record<string, Record<string, KpiSnapshot | null>>>;

export function toKpiSnapshot(
  result: AnalysisResult,
  environment: string,
): KpiSnapshot {
  const isProd = environment === "prod";
  return {
    totalAlarms: result.totalAlarms,
    analyzableAlarms: result.analyzableAlarms,
    ignoredAlarms: result.ignoredAlarms,
    oncallTotal: isProd ? result.oncallTotal : null,
    oncallInReperibilita: isProd ? result.oncallInReperibilita : null,
  };
}

/**
 * Fetches and analyzes every alarm type of a product environment for a
 * date argument. Each type reads its own channel over its own window, and
 * the per-type results are merged in alarm type order.
 */
export class ProductAnalysisRunner {
  private readonly onCallClassifier: OnCallClassifier;

  constructor(
    private readonly config: AnalyzerConfig,
    private readonly source: EventSource,
    private readonly logger: Logger,
  ) {
    this.logger = logger.child({ module: "ProductAnalysisRunner" });
    this.onCallClassifier = new OnCallClassifier(
      config.timezone,
      config.businessHours,
    );
  }

  async analyzeDate(
    productConfig: ProductConfig,
    environment: string,
    dateArgument: string,
  ): Promise<AnalysisResult> {
    const alarmTypes = buildAlarmTypes(productConfig, environment);
    const aggregator = new AnalysisAggregator(
      new IgnoreRuleEngine(productConfig.ignoreRules),
      this.onCallClassifier,
      this.logger,
    );

    const batches = await Promise.all(
      alarmTypes.map(async (alarmType) => ({
        alarmType,
        events: await this.fetchForType(alarmType, dateArgument),
      })),
    );

    return aggregator.analyzeAll(batches);
  }

  private async fetchForType(alarmType: AlarmType, dateArgument: string) {
    const window = alarmType.getTimeWindow(dateArgument, this.config.timezone);
    this.logger.debug(`Fetching events for ${alarmType}`, {
      channel: alarmType.channelReference,
      oldest: window.oldest,
      latest: window.latest,
    });
    return this.source.fetchEvents({
      channelReference: alarmType.channelReference,
      window,
    });
  }
}

export class KpiCollector {
  private readonly runner: ProductAnalysisRunner;

  constructor(
    private readonly config: AnalyzerConfig,
    source: EventSource,
    private readonly logger: Logger,
  ) {
    this.logger = logger.child({ module: "KpiCollector" });
    this.runner = new ProductAnalysisRunner(config, source, logger);
  }

  /**
   * Collects one snapshot per product, environment and day. A day whose
   * events cannot be fetched is recorded as null; configuration errors
   * abort the whole collection.
   */
  async collect(dates: string[]): Promise<KpiData> {
    const kpiData: KpiData = {};
    this.logger.info("Collecting KPI data", {
      products: [...this.config.products.keys()],
      days: dates.length,
    });

    for (const [product, productConfig] of this.config.products) {
      kpiData[product] = {};

      for (const environment of productConfig.environments.keys()) {
        const perDate: Record<string, KpiSnapshot | null> = {};
        kpiData[product][environment] = perDate;

        for (const date of dates) {
          try {
            const result = await this.runner.analyzeDate(
              productConfig,
              environment,
              date,
            );
            perDate[date] = toKpiSnapshot(result, environment);
            this.logger.info(`Processed ${product}/${environment} ${date}`, {
              total: result.totalAlarms,
              analyzable: result.analyzableAlarms,
            });
          } catch (error) {
            if (error instanceof ConfigurationError) {
              throw error;
            }
            this.logger.error(
              `Failed to collect KPIs for ${product}/${environment} ${date}`,
              { error: error instanceof Error ? error.message : String(error) },
            );
            perDate[date] = null;
          }
        }
      }
    }

    return kpiData;
  }
}
