import { open } from "node:fs/promises";
import { format } from "node:util";

type LogMethod = (message: string, ...args: unknown[]) => void;

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

type EmittingLevel = Exclude<LogLevel, "silent">;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  silent: -1,
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function parseBooleanEnv(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHT;
}

export function resolveLogLevel(
  fallback: LogLevel = "info",
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  if (parseBooleanEnv(env.FWGRAB_DEBUG_LOGS) || parseBooleanEnv(env.FWGRAB_DEBUG)) {
    return "debug";
  }

  const configured = env.FWGRAB_LOG_LEVEL?.trim().toLowerCase();
  if (configured) {
    if (configured === "trace" || configured === "verbose") {
      return "debug";
    }
    if (isLogLevel(configured)) {
      return configured;
    }
  }

  return fallback;
}

/** Destination for formatted log lines. */
export interface LogSink {
  write(level: EmittingLevel, line: string, args: unknown[]): void;
}

export const consoleSink: LogSink = {
  write(level, line, args) {
    console[level](line, ...args);
  },
};

export interface FileLogSink extends LogSink {
  readonly path: string;
  close(): Promise<void>;
}

/**
 * Opens (and truncates) a log file. Lines are appended in call order; the
 * first write failure is reported once on stderr and further lines are dropped.
 */
export async function openFileLogSink(filePath: string): Promise<FileLogSink> {
  const handle = await open(filePath, "w");
  const stream = handle.createWriteStream({ encoding: "utf8" });
  let failed = false;

  stream.on("error", (error) => {
    if (!failed) {
      failed = true;
      process.stderr.write(`Log file ${filePath} is no longer writable: ${error.message}\n`);
    }
  });

  return {
    path: filePath,
    write(level, line, args) {
      if (failed) {
        return;
      }
      const text = format(line, ...args);
      stream.write(`${new Date().toISOString()} ${level.toUpperCase()} ${text}\n`);
    },
    close: async () => {
      await new Promise<void>((resolve) => {
        stream.end(() => resolve());
      });
    },
  };
}

export interface FwgrabLogger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

export function createLogger(namespace: string, options: LoggerOptions = {}): FwgrabLogger {
  const prefix = `[${namespace}]`;
  const threshold = options.level ?? resolveLogLevel();
  const sink = options.sink ?? consoleSink;

  const wrap = (level: EmittingLevel): LogMethod => {
    return (message: string, ...args: unknown[]) => {
      if (LEVEL_WEIGHT[level] > LEVEL_WEIGHT[threshold]) {
        return;
      }
      sink.write(level, `${prefix} ${message}`, args);
    };
  };

  return {
    debug: wrap("debug"),
    info: wrap("info"),
    warn: wrap("warn"),
    error: wrap("error"),
  };
}
