export type LogSource = "collect" | "release" | "fetch" | "interrupt";

type EventLevel = "info" | "warn" | "error";

export interface LogEvent {
  event: string;
  message: string;
  data?: Record<string, unknown>;
  error?: unknown;
}

/**
 * Console logger for the command-line tools. Progress and summaries are plain
 * timestamped lines; pipeline events are single-line JSON so a run can be
 * filtered with `jq`.
 */
export interface Logger {
  readonly source: LogSource;
  line(message: string): void;
  failure(error: unknown): void;
  info(entry: LogEvent): void;
  warn(entry: LogEvent): void;
  error(entry: LogEvent): void;
}

function formatTimestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

function writeEvent(source: LogSource, level: EventLevel, entry: LogEvent): void {
  const serialised = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    source,
    event: entry.event,
    message: entry.message,
    ...(entry.data ? { data: entry.data } : {}),
    ...(entry.error !== undefined ? { error: describeError(entry.error) } : {}),
  });

  switch (level) {
    case "error":
      console.error(serialised);
      return;
    case "warn":
      console.warn(serialised);
      return;
    case "info":
      console.log(serialised);
  }
}

export function createLogger(source: LogSource): Logger {
  const prefix = () => `${formatTimestamp()} [${source}]`;

  return {
    source,
    line: (message) => console.log(`${prefix()} ${message}`),
    failure: (error) => console.error(`${prefix()} ${describeError(error)}`),
    info: (entry) => writeEvent(source, "info", entry),
    warn: (entry) => writeEvent(source, "warn", entry),
    error: (entry) => writeEvent(source, "error", entry),
  };
}
