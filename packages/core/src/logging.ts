/**
 * @module @wasmrig/core/logging
 *
 * Scoped loggers with pluggable sinks.
 *
 * @example
 * ```typescript
 * const logger = getLogger('build:config').child({ meta: { triplet: 'wasm32-unknown-unknown' } });
 * logger.warn('debug builds are broken on this target');
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type Fields = Record<string, unknown>;

export interface LogRecord {
  level: LogLevel;
  category: string;
  message: string;
  fields?: Fields;
  error?: Error;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  debug(message: string, fields?: Fields): void;
  info(message: string, fields?: Fields): void;
  warn(message: string, fields?: Fields): void;
  error(message: string, fields?: Fields | Error): void;
  child(bindings: { meta?: Fields }): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const DEFAULT_LEVEL: LogLevel = 'info';

let currentLevel: LogLevel = DEFAULT_LEVEL;
const sinks = new Set<LogSink>();
let defaultSinkInstalled = false;

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
}

/**
 * Replace the logging configuration. Passing `sinks` removes every existing sink.
 */
export function configureLogger(config: LoggerConfig): void {
  if (config.level) {
    currentLevel = config.level;
  }
  if (config.sinks) {
    sinks.clear();
    for (const sink of config.sinks) {
      sinks.add(sink);
    }
    defaultSinkInstalled = true;
  }
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function addSink(sink: LogSink): void {
  sinks.add(sink);
  defaultSinkInstalled = true;
}

export function removeSink(sink: LogSink): void {
  sinks.delete(sink);
}

/**
 * Restore the initial state: `info` level and the console sink on first use.
 */
export function resetLogging(): void {
  currentLevel = DEFAULT_LEVEL;
  sinks.clear();
  defaultSinkInstalled = false;
}

const PREFIXES: Record<LogLevel, string> = {
  debug: 'debug: ',
  info: '',
  warn: 'warning: ',
  error: 'error: ',
};

/**
 * Render a record the way the CLI prints diagnostics. Continuation lines
 * are aligned under the first line's text.
 */
export function formatRecord(record: LogRecord): string {
  const prefix = PREFIXES[record.level];
  const indent = ' '.repeat(prefix.length);
  const [first = '', ...rest] = record.message.split('\n');
  const lines = [`${prefix}${first}`, ...rest.map((line) => `${indent}${line}`)];
  if (record.level === 'debug' && record.fields && Object.keys(record.fields).length > 0) {
    lines[0] += ` ${JSON.stringify(record.fields)}`;
  }
  if (record.error?.stack && currentLevel === 'debug') {
    lines.push(record.error.stack);
  }
  return lines.join('\n');
}

export interface WritableLike {
  write(chunk: string): unknown;
}

export function createConsoleSink(stream: WritableLike = process.stderr): LogSink {
  return (record) => {
    stream.write(`${formatRecord(record)}\n`);
  };
}

/**
 * Sink that keeps records in memory. Used by tests.
 */
export function createMemorySink(): { sink: LogSink; records: LogRecord[] } {
  const records: LogRecord[] = [];
  return {
    records,
    sink: (record) => {
      records.push(record);
    },
  };
}

function emit(record: LogRecord): void {
  if (LEVEL_ORDER[record.level] < LEVEL_ORDER[currentLevel]) {
    return;
  }
  if (!defaultSinkInstalled) {
    sinks.add(createConsoleSink());
    defaultSinkInstalled = true;
  }
  for (const sink of sinks) {
    sink(record);
  }
}

function createLogger(category: string, meta: Fields): Logger {
  const withMeta = (fields?: Fields): Fields | undefined => {
    if (Object.keys(meta).length === 0) {
      return fields;
    }
    return { ...meta, ...(fields ?? {}) };
  };

  return {
    debug(message, fields) {
      emit({ level: 'debug', category, message, fields: withMeta(fields) });
    },
    info(message, fields) {
      emit({ level: 'info', category, message, fields: withMeta(fields) });
    },
    warn(message, fields) {
      emit({ level: 'warn', category, message, fields: withMeta(fields) });
    },
    error(message, fields) {
      if (fields instanceof Error) {
        emit({ level: 'error', category, message, fields: withMeta(), error: fields });
        return;
      }
      emit({ level: 'error', category, message, fields: withMeta(fields) });
    },
    child(bindings) {
      return createLogger(category, { ...meta, ...(bindings.meta ?? {}) });
    },
  };
}

export function getLogger(category: string): Logger {
  return createLogger(category, {});
}
