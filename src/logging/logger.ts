export interface GateLogger {
  debug(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

export const enum LogLevel {
  Debug = 0,
  Info = 1,
  Warning = 2,
  Error = 3,
}

export interface WritableLike {
  write(chunk: string): unknown;
}

export interface StreamLoggerOptions {
  readonly level?: LogLevel;
  readonly now?: () => Date;
}

/**
 * Line-oriented logger for the CLI and the webhook server. The GitHub Action
 * binds {@link GateLogger} to `@actions/core` instead.
 */
export function createStreamLogger(
  stream: WritableLike,
  options: StreamLoggerOptions = {},
): GateLogger {
  const threshold = options.level ?? LogLevel.Info;
  const now = options.now ?? (() => new Date());
  const emit = (level: LogLevel, label: string, message: string): void => {
    if (level < threshold) {
      return;
    }
    stream.write(`${now().toISOString()} ${label} ${message}\n`);
  };
  return {
    debug: (message) => emit(LogLevel.Debug, "debug", message),
    info: (message) => emit(LogLevel.Info, "info", message),
    warning: (message) => emit(LogLevel.Warning, "warn", message),
    error: (message) => emit(LogLevel.Error, "error", message),
  };
}

export const silentLogger: GateLogger = {
  debug: () => undefined,
  info: () => undefined,
  warning: () => undefined,
  error: () => undefined,
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
