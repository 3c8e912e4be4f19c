import { Injectable } from '@nestjs/common';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LoggerOptions = {
  level?: LogLevel;
  scope?: string;
};

/**
 * Structured JSON logger. One line per record:
 * {"ts":"...","level":"INFO","scope":"ResourceGate","message":"...", ...context}
 */
@Injectable()
export class LoggerService {
  private readonly level: LogLevel;
  private readonly scope?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.scope = options.scope;
  }

  child(scope: string): LoggerService {
    return new LoggerService({ level: this.level, scope });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  info(message: string, ...optionalParams: unknown[]) {
    this.log('info', message, optionalParams);
  }

  debug(message: string, ...optionalParams: unknown[]) {
    this.log('debug', message, optionalParams);
  }

  warn(message: string, ...optionalParams: unknown[]) {
    this.log('warn', message, optionalParams);
  }

  error(message: string, ...optionalParams: unknown[]) {
    this.log('error', message, optionalParams);
  }

  private log(level: LogLevel, message: string, optionalParams: unknown[]) {
    if (!this.isLevelEnabled(level)) return;

    const record: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level: level.toUpperCase(),
      ...(this.scope ? { scope: this.scope } : {}),
      message,
    };

    if (optionalParams.length > 0) {
      const context = optionalParams.map((p) => toSafe(p, 0, new WeakSet<object>()));
      if (context.length === 1 && isPlainRecord(context[0]) && !hasReservedKey(context[0])) {
        Object.assign(record, context[0]);
      } else {
        record.context = context;
      }
    }

    const payload = safeStringify(record);

    switch (level) {
      case 'debug':
        console.debug(payload);
        break;
      case 'warn':
        console.warn(payload);
        break;
      case 'error':
        console.error(payload);
        break;
      default:
        console.info(payload);
    }
  }
}

const REDACT_KEY_RE = /(authorization|token|api[_-]?key|password|secret)/i;
const MAX_STRING = 2000;
const MAX_DEPTH = 4;
const MAX_KEYS = 100;
const RESERVED_KEYS = new Set(['ts', 'level', 'scope', 'message']);

const truncate = (s: string): string =>
  s.length > MAX_STRING ? `${s.slice(0, MAX_STRING)}…(+${s.length - MAX_STRING} chars)` : s;

function toSafe(value: unknown, depth: number, seen: WeakSet<object>): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: truncate(value.message),
      ...('code' in value && typeof value.code === 'string' ? { code: value.code } : {}),
      ...(value.cause !== undefined && depth + 1 < MAX_DEPTH ? { cause: toSafe(value.cause, depth + 1, seen) } : {}),
    };
  }
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'string') return truncate(value);
  if (!value || typeof value !== 'object') return value;
  if (seen.has(value)) return '[Circular]';
  if (depth >= MAX_DEPTH) return '[Truncated]';
  seen.add(value);
  if (Array.isArray(value)) return value.slice(0, MAX_KEYS).map((item) => toSafe(item, depth + 1, seen));

  const out: Record<string, unknown> = {};
  const entries = Object.entries(value);
  for (const [key, val] of entries.slice(0, MAX_KEYS)) {
    out[key] = REDACT_KEY_RE.test(key) ? '[REDACTED]' : toSafe(val, depth + 1, seen);
  }
  if (entries.length > MAX_KEYS) out.__truncated__ = `[+${entries.length - MAX_KEYS} keys omitted]`;
  return out;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function hasReservedKey(obj: Record<string, unknown>): boolean {
  return Object.keys(obj).some((key) => RESERVED_KEYS.has(key));
}

function safeStringify(record: Record<string, unknown>): string {
  try {
    return JSON.stringify(record);
  } catch {
    return JSON.stringify({ ts: record.ts, level: record.level, message: record.message });
  }
}
