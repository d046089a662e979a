/**
 * Lightweight structured logger for the layout viewer.
 *
 * Provides consistent prefixed log output with a process-wide level
 * threshold. The viewer settings store pushes its `logLevel` here.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value);
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Create a namespaced logger.
 *
 * ```ts
 * const log = createLogger("Resolver");
 * log.warn("Referenced structure not found", { name: "VIA1" });
 * // → [LayoutViewer:Resolver] Referenced structure not found { name: "VIA1" }
 * ```
 */
export function createLogger(namespace: string): Logger {
  const prefix = `[LayoutViewer:${namespace}]`;

  return {
    debug: (...args) => {
      if (shouldLog("debug")) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (shouldLog("info")) console.log(prefix, ...args);
    },
    warn: (...args) => {
      if (shouldLog("warn")) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (shouldLog("error")) console.error(prefix, ...args);
    },
  };
}

// ── One-shot warnings ──

const warnedKeys = new Set<string>();

/** Emit `log.warn` at most once per key. Returns true when the warning was emitted. */
export function warnOnce(log: Logger, key: string, ...args: unknown[]): boolean {
  if (warnedKeys.has(key)) return false;
  warnedKeys.add(key);
  log.warn(...args);
  return true;
}

export function resetWarnOnce(): void {
  warnedKeys.clear();
}
