export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function toLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }

  return "info";
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }

  return String(error);
}

// stdout carries the record stream, so log lines go to stderr.
function writeToStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

export function createLogger(
  level: string,
  write: (line: string) => void = writeToStderr
): Logger {
  const threshold = LEVEL_ORDER[toLogLevel(level)];

  const emit = (lineLevel: LogLevel, message: string): void => {
    if (LEVEL_ORDER[lineLevel] < threshold) {
      return;
    }

    write(`${lineLevel.toUpperCase()} ${message}`);
  };

  return {
    debug(message: string): void {
      emit("debug", message);
    },
    info(message: string): void {
      emit("info", message);
    },
    warn(message: string): void {
      emit("warn", message);
    },
    error(message: string, error?: unknown): void {
      emit("error", error === undefined ? message : `${message}: ${describeError(error)}`);
    }
  };
}
