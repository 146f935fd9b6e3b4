// ---------------------------------------------------------------------------
// @spatial-text/shared: Structured Logger
// ---------------------------------------------------------------------------
// One JSON object per line on stdout: ts, level, scope, msg + fields.
// Readable by any aggregator that ingests JSON lines.

import type { z } from 'zod';
import { readLogLevel, type logLevelSchema } from './env.js';

export type LogLevel = z.infer<typeof logLevelSchema>;

export type LogFields = Record<string, unknown>;

export type LogEntry = {
  ts: string;
  level: LogLevel;
  scope: string;
  msg: string;
} & LogFields;

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  readonly scope: string;
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  /** Logger sharing sink and level with a nested scope (`parent:child`). */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Minimum level emitted. Defaults to `LOG_LEVEL` from the environment. */
  level?: LogLevel;
  sink?: LogSink;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const stdoutSink: LogSink = (entry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? readLogLevel();
  const sink = options.sink ?? stdoutSink;
  const threshold = LEVEL_RANK[level];

  const emit = (entryLevel: LogLevel, msg: string, fields?: LogFields): void => {
    if (LEVEL_RANK[entryLevel] < threshold) return;
    sink({ ...fields, ts: new Date().toISOString(), level: entryLevel, scope, msg });
  };

  return {
    scope,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (childScope) => createLogger(`${scope}:${childScope}`, { level, sink }),
  };
}
