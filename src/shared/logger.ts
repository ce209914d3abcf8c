/**
 * Logger used by the orchestration layer (lookup service, store builder).
 *
 * Defaults to a no-op logger; the CLI switches to {@link consoleLogger}
 * when `DEBUG` is set. Console output goes to stderr so that `--json`
 * output on stdout stays parseable.
 */

/** Structured context attached to a log line. */
export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, error?: unknown, fields?: LogFields): void;
}

function line(level: string, message: string, fields?: LogFields): string {
  const suffix = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
  return `[${level}] ${message}${suffix}`;
}

export const consoleLogger: Logger = {
  debug(message, fields) {
    console.error(line("DEBUG", message, fields));
  },
  info(message, fields) {
    console.error(line("INFO", message, fields));
  },
  warn(message, fields) {
    console.error(line("WARN", message, fields));
  },
  error(message, error, fields) {
    const detail = error instanceof Error ? { error: error.message, ...fields } : fields;
    console.error(line("ERROR", message, detail));
  },
};

export const noopLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

let current: Logger = noopLogger;

/** The process-wide logger. */
export function getLogger(): Logger {
  return current;
}

export function setLogger(logger: Logger): void {
  current = logger;
}
