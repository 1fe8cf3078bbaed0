type LogLevel = "info" | "warn" | "error";

const CONSOLE_WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args)
};

export interface Logger {
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
  /** Same output, with `[scope]` after the level tag. */
  child(scope: string): Logger;
}

const write = (level: LogLevel, scope: string | undefined, message: string, meta: unknown): void => {
  const line = scope ? `[${level.toUpperCase()}] [${scope}] ${message}` : `[${level.toUpperCase()}] ${message}`;

  if (meta === undefined) {
    CONSOLE_WRITERS[level](line);
    return;
  }

  CONSOLE_WRITERS[level](line, meta);
};

const createLogger = (scope?: string): Logger => ({
  info: (message, meta) => write("info", scope, message, meta),
  warn: (message, meta) => write("warn", scope, message, meta),
  error: (message, meta) => write("error", scope, message, meta),
  child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope)
});

export const logger = createLogger();
