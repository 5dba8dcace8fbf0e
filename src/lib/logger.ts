/**
 * Structured JSON logging on the console, same line shape as the middy request logger.
 * LOG_LEVEL=trace enables TRACE lines; LOG_LEVEL=silent mutes everything.
 */

type Level = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<Level, number> = { TRACE: 10, DEBUG: 20, INFO: 30, WARN: 40, ERROR: 50 };

const SECRET_FIELD = /secret|password|pwd|private|signature|token|api_?key|^authorization$/i;

function isLevel(value: string): value is Level {
  return value in LEVEL_ORDER;
}

function threshold(): number {
  const level = process.env.LOG_LEVEL?.toUpperCase() ?? 'INFO';
  if (level === 'SILENT') return Number.POSITIVE_INFINITY;
  return isLevel(level) ? LEVEL_ORDER[level] : LEVEL_ORDER.INFO;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function redactValue(value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message };
  if (Array.isArray(value)) return value.map(redactValue);
  if (isRecord(value)) return redact(value);
  return value;
}

/** Mask values whose field name looks like a credential, at any depth. */
export function redact(fields: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = SECRET_FIELD.test(key) && typeof value === 'string' ? '[REDACTED]' : redactValue(value);
  }
  return out;
}

function write(level: Level, message: string, fields: Record<string, unknown> = {}): void {
  if (LEVEL_ORDER[level] < threshold()) return;
  const line = JSON.stringify({ level, message, ...redact(fields) });
  if (level === 'ERROR') console.error(line);
  else if (level === 'WARN') console.warn(line);
  else console.info(line);
}

export const logger = {
  trace: (message: string, fields?: Record<string, unknown>) => write('TRACE', message, fields),
  debug: (message: string, fields?: Record<string, unknown>) => write('DEBUG', message, fields),
  info: (message: string, fields?: Record<string, unknown>) => write('INFO', message, fields),
  warn: (message: string, fields?: Record<string, unknown>) => write('WARN', message, fields),
  error: (message: string, fields?: Record<string, unknown>) => write('ERROR', message, fields),
};
