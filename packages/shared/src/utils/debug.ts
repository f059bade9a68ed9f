// Check BOXWRIGHT_DEBUG env var at module load
let debugEnabled = process.env.BOXWRIGHT_DEBUG === '1';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
}

/**
 * Enable debug logging. Call this when --debug flag is passed.
 */
export function enableDebug(): void {
  debugEnabled = true;
}

/**
 * Disable debug logging again (tests toggle it around assertions).
 */
export function disableDebug(): void {
  debugEnabled = false;
}

/**
 * Safely stringify an object, handling circular references.
 */
function safeStringify(obj: unknown): string {
  try {
    return JSON.stringify(obj);
  } catch {
    const seen = new WeakSet<object>();
    return JSON.stringify(obj, (_key, value: unknown) => {
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) {
          return '[Circular]';
        }
        seen.add(value);
      }
      return value;
    });
  }
}

/**
 * Format a log message with timestamp and optional scope.
 */
export function formatMessage(scope: string | undefined, message: string, args: unknown[]): string {
  const timestamp = new Date().toISOString();
  const scopeStr = scope ? `[${scope}] ` : '';
  const argsStr = args.length > 0
    ? ' ' + args.map(a => typeof a === 'object' ? safeStringify(a) : String(a)).join(' ')
    : '';
  return `${timestamp} ${scopeStr}${message}${argsStr}\n`;
}

/**
 * Logs go to stderr so they never interleave with a document written to stdout.
 */
function output(formatted: string): void {
  process.stderr.write(formatted);
}

/**
 * Create a scoped logger for a specific module. Silent unless debug is
 * enabled via --debug or BOXWRIGHT_DEBUG=1. Scope appears in brackets:
 * [scope] LEVEL message
 *
 * @example
 * const log = createLogger('layout');
 * log.debug('Placed level', { level: 2, nodes: 3 });
 * log.warn('Singleton group', 'g0');
 */
export function createLogger(scope: string): Logger {
  const logWithLevel = (level: LogLevel, message: string, args: unknown[]) => {
    if (!debugEnabled) return;
    const levelStr = level.toUpperCase().padEnd(5);
    output(formatMessage(scope, `${levelStr} ${message}`, args));
  };

  return {
    debug: (message: string, ...args: unknown[]) => logWithLevel('debug', message, args),
    info: (message: string, ...args: unknown[]) => logWithLevel('info', message, args),
    warn: (message: string, ...args: unknown[]) => logWithLevel('warn', message, args),
    error: (message: string, ...args: unknown[]) => logWithLevel('error', message, args),
  };
}
