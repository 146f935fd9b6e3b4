// ---------------------------------------------------------------------------
// @spatial-text/shared: Barrel Export
// ---------------------------------------------------------------------------

export { ConfigurationError } from './errors.js';
export { parseOptions, formatIssues } from './validate.js';
export { readLogLevel, logLevelSchema } from './env.js';
export {
  createLogger,
  stdoutSink,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogEntry,
  type LogFields,
  type LogSink,
} from './logger.js';
