export interface LogLevelConfig {
  console: string;
  file: string;
}

/** Runner settings, read from `.config.json` and overridden by CLI options. */
export interface AnalyzerRunnerConfig {
  // Logging
  logLevel?: LogLevelConfig;
  logDir?: string;

  // Inputs
  productsConfigPath?: string;
  eventsDir?: string;

  // Output
  outputDir?: string;

  // Overrides the timezone of the products configuration
  timezone?: string;
}
