// Minimal structured logger: one JSON record per console line

type LogContext = Record<string, unknown> | undefined;

type LogLevel = 'info' | 'warn' | 'error';

function write(level: LogLevel, payload: Record<string, unknown>) {
  const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
  try {
    sink(JSON.stringify({ level, ts: new Date().toISOString(), ...payload }));
  } catch {
    // Circular context; fall back to the raw values
    sink(`[${level}]`, payload.message, payload);
  }
}

export function logEvent(message: string, context?: LogContext) {
  write('info', { message, ...(context ? { context } : {}) });
}

export function logQueryError(message: string, error: unknown, context?: LogContext) {
  write('error', {
    message,
    error: normalizeError(error),
    ...(context ? { context } : {})
  });
}

export function logValidationFailure(message: string, details: unknown, context?: LogContext) {
  write('warn', {
    message,
    details,
    ...(context ? { context } : {})
  });
}

export function normalizeError(err: unknown) {
  if (!err) return null;
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  if (typeof err === 'object') return err;
  return { message: String(err) };
}
