/**
 * Structured JSON logging.
 *
 * Every line is a single JSON object on stdout (stderr for errors) with a
 * timestamp, level, scope and message, followed by caller-supplied fields.
 * Log shippers pick the lines up as-is; nothing here buffers or batches.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  /** Returns a logger that stamps `fields` onto every line. */
  child(fields: Record<string, unknown>): Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function resolveThreshold(): number {
  const raw = (process.env['LOG_LEVEL'] ?? 'info').toLowerCase();
  return isLogLevel(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

/**
 * Create a scoped logger.
 *
 * @example
 * ```typescript
 * const log = createLogger('worker').child({ workerId: 'w-1' });
 * log.info('Job claimed', { jobId });
 * // {"timestamp":"…","level":"info","scope":"worker","message":"Job claimed","workerId":"w-1","jobId":"…"}
 * ```
 */
export function createLogger(scope: string, bound: Record<string, unknown> = {}): Logger {
  const write = (level: LogLevel, message: string, fields?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < resolveThreshold()) return;
    const line = {
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      ...bound,
      ...fields
    };
    let serialized: string;
    try {
      serialized = JSON.stringify(line);
    } catch (err) {
      // Circular or BigInt fields: keep the envelope, drop the payload
      serialized = JSON.stringify({
        timestamp: line.timestamp,
        level,
        scope,
        message,
        serializationError: errorMessage(err)
      });
    }
    if (level === 'error') {
      console.error(serialized);
    } else {
      console.log(serialized);
    }
  };

  return {
    debug: (message, fields) => write('debug', message, fields),
    info: (message, fields) => write('info', message, fields),
    warn: (message, fields) => write('warn', message, fields),
    error: (message, fields) => write('error', message, fields),
    child: fields => createLogger(scope, { ...bound, ...fields })
  };
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function clipString(value: string, max = 2000): string {
  return value.length > max ? `${value.slice(0, max)}…` : value;
}

export function clipUnknown(value: unknown, max = 2000): string | null {
  if (value === null || value === undefined) return null;
  const str = typeof value === 'string' ? value : JSON.stringify(value);
  return clipString(str ?? '', max);
}
