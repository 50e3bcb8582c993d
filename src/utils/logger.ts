/**
 * Scoped stderr logger.
 *
 * Every module takes a scope with `createLogger('indexer')`. Lines go to
 * stderr so CLI output on stdout stays pipeable. The threshold comes from
 * `CHUNKVAULT_LOG_LEVEL` (default `info`); `CHUNKVAULT_LOG_JSON=true` switches
 * to one JSON object per line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EntryLevel = Exclude<LogLevel, 'silent'>;

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

export interface LogRecord {
  time: string;
  level: EntryLevel;
  scope: string;
  msg: string;
  fields?: LogFields;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function toLevel(value: string | undefined): LogLevel {
  return LEVELS.find((level) => level === value) ?? 'info';
}

const settings = {
  level: toLevel(process.env.CHUNKVAULT_LOG_LEVEL),
  json: process.env.CHUNKVAULT_LOG_JSON === 'true',
};

export function setLogLevel(level: LogLevel): void {
  settings.level = level;
}

export function getLogLevel(): LogLevel {
  return settings.level;
}

export function setJsonMode(enabled: boolean): void {
  settings.json = enabled;
}

function renderValue(value: unknown): string {
  if (value instanceof Error) return value.message;
  return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * Text form: `12:34:56.789 WARN  scope: message key=value ...`
 */
export function formatRecord(record: LogRecord, json: boolean = settings.json): string {
  if (json) return JSON.stringify(record);

  const clock = record.time.slice(11, 23);
  const pairs = Object.entries(record.fields ?? {}).map(([key, value]) => `${key}=${renderValue(value)}`);
  return [clock, record.level.toUpperCase().padEnd(5), `${record.scope}: ${record.msg}`, ...pairs].join(' ');
}

function emit(scope: string, level: EntryLevel, msg: string, fields?: LogFields): void {
  if (LEVELS.indexOf(level) < LEVELS.indexOf(settings.level)) return;

  const record: LogRecord = { time: new Date().toISOString(), level, scope, msg };
  if (fields && Object.keys(fields).length > 0) record.fields = fields;
  process.stderr.write(`${formatRecord(record)}\n`);
}

export function createLogger(scope: string): Logger {
  return {
    debug: (msg, fields) => emit(scope, 'debug', msg, fields),
    info: (msg, fields) => emit(scope, 'info', msg, fields),
    warn: (msg, fields) => emit(scope, 'warn', msg, fields),
    error: (msg, fields) => emit(scope, 'error', msg, fields),
  };
}
