// ============================================
// Structured Logger
// ============================================

export interface StructuredLogger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: unknown, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Console-based structured logger: one JSON line per entry, stamped with the
 * service name.
 */
export function createLogger(service: string): StructuredLogger {
  const entry = (level: string, message: string, meta?: Record<string, unknown>) =>
    JSON.stringify({ level, service, message, ...meta, timestamp: new Date().toISOString() });

  return {
    info(message, meta) {
      console.log(entry('info', message, meta));
    },
    warn(message, meta) {
      console.warn(entry('warn', message, meta));
    },
    error(message, error, meta) {
      const errorInfo = error instanceof Error
        ? { errorMessage: error.message, stack: error.stack }
        : error === undefined ? {} : { errorMessage: String(error) };
      console.error(entry('error', message, { ...errorInfo, ...meta }));
    },
    debug(message, meta) {
      if (process.env.NODE_ENV !== 'production') {
        console.debug(entry('debug', message, meta));
      }
    },
  };
}
