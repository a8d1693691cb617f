export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  fields: Record<string, unknown>;
  message: string | undefined;
}

export interface RecordingLogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
  entries: LogEntry[];
  messages(level?: LogLevel): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (obj: object, msg?: string) => {
    entries.push({ level, fields: { ...obj }, message: msg });
  };

  return {
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    entries,
    messages(level) {
      return entries
        .filter((entry) => level === undefined || entry.level === level)
        .map((entry) => entry.message ?? "");
    }
  };
}
