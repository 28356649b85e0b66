import { Config, Effect, HashMap, Layer, LogLevel, Logger } from "effect";

export type LogFormat = "text" | "json";

export interface LogEntry {
  readonly timestamp: string;
  readonly level: string;
  readonly message: string;
  readonly data?: Record<string, unknown>;
}

const LEVELS: Record<string, LogLevel.LogLevel> = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  warning: LogLevel.Warning,
  error: LogLevel.Error,
};

export const LoggingConfig = Config.all({
  level: Config.string("LOG_LEVEL").pipe(
    Config.map((value) => LEVELS[value.trim().toLowerCase()] ?? LogLevel.Info),
    Config.withDefault(LogLevel.Info)
  ),
  format: Config.string("LOG_FORMAT").pipe(
    Config.map((value): LogFormat => (value.trim().toLowerCase() === "json" ? "json" : "text")),
    Config.withDefault<LogFormat>("text")
  ),
});

const renderMessage = (message: unknown): string => {
  if (Array.isArray(message)) return message.map(renderMessage).join(" ");
  if (typeof message === "string") return message;
  return JSON.stringify(message);
};

export const formatLogLine = (entry: LogEntry, format: LogFormat): string => {
  if (format === "json") {
    return JSON.stringify(entry);
  }
  const prefix = `[${entry.timestamp}] [${entry.level}]`;
  return entry.data
    ? `${prefix} ${entry.message} ${JSON.stringify(entry.data)}`
    : `${prefix} ${entry.message}`;
};

/**
 * Logger writing to stderr. Stdout carries the output messages and must
 * stay clean.
 */
export const makeStderrLogger = (format: LogFormat, write: (line: string) => void) =>
  Logger.make(({ annotations, date, logLevel, message }) => {
    const data: Record<string, unknown> = {};
    for (const [key, value] of annotations) {
      data[key] = value;
    }
    write(
      formatLogLine(
        {
          timestamp: date.toISOString(),
          level: logLevel.label,
          message: renderMessage(message),
          ...(HashMap.size(annotations) > 0 && { data }),
        },
        format
      )
    );
  });

export const LoggerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const { level, format } = yield* LoggingConfig;
    const logger = makeStderrLogger(format, (line) => process.stderr.write(`${line}\n`));
    return Layer.merge(Logger.replace(Logger.defaultLogger, logger), Logger.minimumLogLevel(level));
  })
);
