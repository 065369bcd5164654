import fs from "node:fs";
import path from "node:path";

export type LogLevel = "info" | "warn" | "error";

/**
 * Destination for the engine's log lines. Passed in explicitly so the
 * matcher and executor never reach for a process-wide logger.
 */
export type ReportSink = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export type LogRecord = {
  level: LogLevel;
  message: string;
};

const LEVEL_PREFIX: Record<LogLevel, string> = {
  info: "",
  warn: "Warning: ",
  error: "Error: ",
};

export function createConsoleSink(
  stdout: NodeJS.WritableStream = process.stdout,
  stderr: NodeJS.WritableStream = process.stderr,
): ReportSink {
  return {
    info(message) {
      stdout.write(`${message}\n`);
    },
    warn(message) {
      stderr.write(`${LEVEL_PREFIX.warn}${message}\n`);
    },
    error(message) {
      stderr.write(`${LEVEL_PREFIX.error}${message}\n`);
    },
  };
}

/**
 * Append-only log file. Lines are written synchronously so an interrupted run
 * still leaves every line for the actions it completed.
 */
export function createFileSink(filePath: string, now: () => Date = () => new Date()): ReportSink {
  let dirReady = false;
  const write = (level: LogLevel, message: string) => {
    if (!dirReady) {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      dirReady = true;
    }
    const line = `${now().toISOString()} ${level.toUpperCase().padEnd(5)} ${message}\n`;
    fs.appendFileSync(filePath, line, { encoding: "utf-8" });
  };
  return {
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}

export function createTeeSink(...sinks: ReportSink[]): ReportSink {
  return {
    info(message) {
      for (const sink of sinks) {
        sink.info(message);
      }
    },
    warn(message) {
      for (const sink of sinks) {
        sink.warn(message);
      }
    },
    error(message) {
      for (const sink of sinks) {
        sink.error(message);
      }
    },
  };
}

export type MemorySink = ReportSink & {
  records: LogRecord[];
  messages(level: LogLevel): string[];
};

export function createMemorySink(): MemorySink {
  const records: LogRecord[] = [];
  return {
    records,
    info: (message) => records.push({ level: "info", message }),
    warn: (message) => records.push({ level: "warn", message }),
    error: (message) => records.push({ level: "error", message }),
    messages(level) {
      return records.filter((r) => r.level === level).map((r) => r.message);
    },
  };
}
