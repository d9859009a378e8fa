import { type Logger, createLogger, format, transports } from "winston";
import type TransportStream from "winston-transport";

export interface LoggerOptions {
  consoleLevel?: string;
  fileLevel?: string;
  filePath?: string;
  // tests pass true to keep the console quiet
  silent?: boolean;
}

export const orderedJsonFormat = format.printf((info) => {
  const { timestamp, level, message, module, component, ...rest } = info;

  const ordered: Record<string, unknown> = {};

  if (timestamp) ordered.timestamp = timestamp;
  if (level) ordered.level = level;
  if (module) ordered.module = module;
  if (component) ordered.component = component;
  if (message) ordered.message = message;

  const sortedKeys = Object.keys(rest).sort();
  for (const key of sortedKeys) {
    ordered[key] = rest[key];
  }

  return JSON.stringify(ordered);
});

export function createOrderedLogger(options: LoggerOptions = {}): Logger {
  const { consoleLevel = "info", fileLevel, filePath, silent = false } = options;

  const loggerTransports: TransportStream[] = [
    new transports.Console({
      level: consoleLevel,
      stderrLevels: ["error", "warn"],
    }),
  ];

  if (fileLevel && filePath) {
    loggerTransports.push(
      new transports.File({
        filename: filePath,
        level: fileLevel,
      }),
    );
  }

  return createLogger({
    level: "silly", // transports do the filtering
    silent,
    format: format.combine(format.timestamp(), orderedJsonFormat),
    transports: loggerTransports,
  });
}
