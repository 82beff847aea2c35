import pino, { type Logger } from "pino";
import { errorMessage } from "./shared/errors.js";

/** Used when DEVHOST_SETUP_LOG_DIR is unset. */
export const DEFAULT_LOG_DIR = "/tmp/devhost-setup";

export interface LoggerOptions {
  /** Destination of the run log. Without one the logger is disabled. */
  logFile?: string;
  level?: string;
}

/**
 * Root logger of a run. Writes JSON lines to the timestamped log file created once at
 * startup; the console side of every message goes through the Reporter.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  if (!options.logFile) {
    return pino({ name: "devhost-setup", level, enabled: false });
  }
  return pino(
    { name: "devhost-setup", level, redact: ["stdin", "password"] },
    pino.destination({ dest: options.logFile, mkdir: true, sync: true }),
  );
}

export interface RunLog {
  logger: Logger;
  /** Null when the log file could not be opened. */
  logFile: string | null;
  error: string | null;
}

/**
 * Open the run log. A destination that cannot be created (a root-owned log directory
 * left by an earlier sudo run, a file in the way) leaves the run without a log file.
 */
export function openRunLog(logFile: string, level?: string): RunLog {
  try {
    return { logger: createLogger({ logFile, level }), logFile, error: null };
  } catch (err) {
    return { logger: createLogger({ level }), logFile: null, error: errorMessage(err) };
  }
}

/** `setup-YYYYMMDD-HHMMSS.log` in local time. */
export function logFileName(now: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `setup-${date}-${time}.log`;
}
