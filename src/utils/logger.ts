export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = (line: string) => void;

// stdout carries the MCP stdio transport, so log lines go to stderr.
const stderrSink: LogSink = (line) => {
  console.error(line);
};

export function createLogger(
  scope: string,
  level: LogLevel = "info",
  sink: LogSink = stderrSink,
): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (
    messageLevel: Exclude<LogLevel, "silent">,
    message: string,
    data?: Record<string, unknown>,
  ) => {
    if (LEVEL_ORDER[messageLevel] < threshold) {
      return;
    }
    const prefix = `[${new Date().toISOString()}] [${messageLevel.toUpperCase()}] [${scope}]`;
    sink(data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`);
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level, sink),
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
