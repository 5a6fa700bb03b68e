/**
 * Console logging for the orchestration layer. The compiler stages never log.
 */

export type LogFields = Record<string, string | number | boolean | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface ConsoleLoggerOptions {
  /** Emit debug lines (default: false) */
  verbose?: boolean;
  /** Destination; defaults to the global console */
  console?: Pick<Console, 'log' | 'error'>;
}

export function formatFields(fields?: LogFields): string {
  if (!fields) return '';
  const parts = Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const out = options.console ?? console;
  return {
    debug(message, fields) {
      if (options.verbose) out.error(`  · ${message}${formatFields(fields)}`);
    },
    info(message, fields) {
      out.log(`  ${message}${formatFields(fields)}`);
    },
    warn(message, fields) {
      out.error(`  ⚠  ${message}${formatFields(fields)}`);
    },
    error(message, fields) {
      out.error(`  ERROR: ${message}${formatFields(fields)}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
