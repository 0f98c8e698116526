export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger used by every pipeline component. Components receive one by
 * injection and stay silent when none is given.
 */
export interface Logger {
  debug(message: string, context?: object): void;
  info(message: string, context?: object): void;
  warn(message: string, context?: object): void;
  error(message: string, context?: object): void;
}

export class NullLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Writes to the console, dropping messages below `minLevel`.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly minLevel: LogLevel = "info") {}

  private log(level: LogLevel, message: string, context?: object) {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) return;

    const write = console[level];
    if (context && Object.keys(context).length > 0) {
      write(message, context);
    } else {
      write(message);
    }
  }

  debug(message: string, context?: object) {
    this.log("debug", message, context);
  }

  info(message: string, context?: object) {
    this.log("info", message, context);
  }

  warn(message: string, context?: object) {
    this.log("warn", message, context);
  }

  error(message: string, context?: object) {
    this.log("error", message, context);
  }
}
