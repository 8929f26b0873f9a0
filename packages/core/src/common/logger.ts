/**
 * Optional logger accepted by the facade and the adapters.
 *
 * Every method is optional; a missing logger or method means silence.
 */
export interface MetastoreLogger {
  debug?: (...args: unknown[]) => void;
  warn?: (...args: unknown[]) => void;
  error?: (...args: unknown[]) => void;
}

export type LogLevel = "debug" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

/**
 * Logger that forwards to `console`, dropping messages below `level`.
 *
 * @example
 * ```typescript
 * const metastore = new Metastore({
 *   storage: new MemoryMetadataStorage(),
 *   logger: createConsoleLogger({ level: "warn" }),
 * });
 * ```
 */
export function createConsoleLogger(options: { level?: LogLevel; prefix?: string } = {}): MetastoreLogger {
  const threshold = LEVEL_ORDER[options.level ?? "warn"];
  const prefix = options.prefix ?? "[metastore]";
  const enabled = (level: Exclude<LogLevel, "silent">) => LEVEL_ORDER[level] >= threshold;

  return {
    debug: (...args) => {
      if (enabled("debug")) console.debug(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled("error")) console.error(prefix, ...args);
    },
  };
}
