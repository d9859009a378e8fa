export class ConfigurationError extends Error {
  constructor(
    public readonly detail: string,
    public readonly field?: string,
  ) {
    super(
      field
        ? `Configuration error (field: ${field}): ${detail}`
        : `Configuration error: ${detail}`,
    );
    this.name = "ConfigurationError";
  }
}

export class ConfigParseError extends ConfigurationError {
  constructor(
    message: string,
    public readonly filePath: string,
    field?: string,
  ) {
    super(`${message} (in ${filePath})`, field);
    this.name = "ConfigParseError";
  }
}

export class DateArgumentError extends Error {
  constructor(
    message: string,
    public readonly argument: string,
  ) {
    super(`Invalid date argument '${argument}': ${message}`);
    this.name = "DateArgumentError";
  }
}

export class EventSourceError extends Error {
  constructor(
    message: string,
    public readonly channelReference: string,
    public readonly cause?: unknown,
  ) {
    super(`Failed to fetch events for channel ${channelReference}: ${message}`);
    this.name = "EventSourceError";
  }
}
