/**
 * Logger Abstraction
 *
 * Routes messages to Strapi's logger when the app is running inside Strapi
 * and to the console otherwise (scripts, tests).
 *
 * Structured entries are rendered as a readable line in development and as a
 * single JSON object per line when LOG_FORMAT=json.
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry.
 */
export interface StructuredLogEntry {
  /** Event identifier (e.g. 'research_complete', 'article_generated') */
  readonly event: string;
  readonly message?: string;
  readonly [key: string]: unknown;
}

export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

export interface StructuredLogger extends Logger {
  structured: (level: LogLevel, entry: StructuredLogEntry) => void;
}

// ============================================================================
// Base Logger
// ============================================================================

const isJsonLogging = (): boolean => process.env.LOG_FORMAT === 'json';

const hasStrapi = (): boolean => typeof strapi !== 'undefined' && Boolean(strapi?.log);

function write(level: LogLevel, message: string): void {
  if (hasStrapi()) {
    strapi.log[level](message);
    return;
  }
  switch (level) {
    case 'warn':
      console.warn(message);
      break;
    case 'error':
      console.error(message);
      break;
    default:
      console.log(message);
  }
}

export const logger: Logger = {
  info: (message: string) => write('info', message),
  warn: (message: string) => write('warn', message),
  error: (message: string) => write('error', message),
  debug: (message: string) => write('debug', message),
};

// ============================================================================
// Prefixed / Structured Logger
// ============================================================================

/**
 * Formats a structured entry as `[Prefix] [event]: message {"extra":"data"}`.
 */
export function formatStructuredEntry(prefix: string, entry: StructuredLogEntry): string {
  const { event, message, ...rest } = entry;
  const dataStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const msgStr = message ? `: ${message}` : '';
  return `${prefix} [${event}]${msgStr}${dataStr}`;
}

/**
 * Formats a structured entry as one JSON line for log aggregators.
 */
export function formatStructuredJson(
  prefix: string,
  level: LogLevel,
  entry: StructuredLogEntry,
  timestamp: string = new Date().toISOString()
): string {
  return JSON.stringify({
    timestamp,
    level,
    module: prefix.replace(/[[\]]/g, '').trim(),
    ...entry,
  });
}

/**
 * Creates a logger that prepends `prefix` to every message and supports
 * structured entries.
 *
 * @example
 * const log = createPrefixedLogger('[Wikipedia]');
 * log.info('Looking up "Alan Turing"');
 * log.structured('info', { event: 'lookup_complete', found: true, chars: 5120 });
 */
export function createPrefixedLogger(prefix: string, base: Logger = logger): StructuredLogger {
  return {
    info: (message: string) => base.info(`${prefix} ${message}`),
    warn: (message: string) => base.warn(`${prefix} ${message}`),
    error: (message: string) => base.error(`${prefix} ${message}`),
    debug: (message: string) => base.debug(`${prefix} ${message}`),
    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const formatted = isJsonLogging()
        ? formatStructuredJson(prefix, level, entry)
        : formatStructuredEntry(prefix, entry);
      base[level](formatted);
    },
  };
}
