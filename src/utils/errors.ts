export class ImporterError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class IcsParseError extends ImporterError {}

export class AmbiguousTimezoneError extends ImporterError {
  constructor(readonly timezones: string[]) {
    super(`Calendar declares multiple timezones (${timezones.join(', ')}); refusing to guess one for timed events`);
  }
}

export class UnsupportedTimezoneError extends ImporterError {
  constructor(readonly tzid: string) {
    super(`Unsupported timezone: ${tzid}`);
  }
}

export class CalendarNotFoundError extends ImporterError {
  constructor(readonly selector: string) {
    super(`No calendar found matching '${selector}'`);
  }
}

export class ConfigError extends ImporterError {}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
