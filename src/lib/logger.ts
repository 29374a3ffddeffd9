import { LOG_LEVEL, type LogLevel } from "../config";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string, err?: unknown): void;
  error(message: string, err?: unknown): void;
}

/**
 * Console logger that tags each line with `[component]`.
 */
export function createLogger(component: string, level: LogLevel = LOG_LEVEL): Logger {
  const enabled = (at: LogLevel) => LEVEL_ORDER[at] >= LEVEL_ORDER[level];
  const tag = `[${component}]`;

  return {
    debug(message) {
      if (enabled("debug")) console.log(`${tag} ${message}`);
    },
    info(message) {
      if (enabled("info")) console.log(`${tag} ${message}`);
    },
    warn(message, err) {
      if (!enabled("warn")) return;
      if (err === undefined) console.warn(`${tag} ${message}`);
      else console.warn(`${tag} ${message}`, err);
    },
    error(message, err) {
      if (!enabled("error")) return;
      if (err === undefined) console.error(`${tag} ${message}`);
      else console.error(`${tag} ${message}`, err);
    },
  };
}
