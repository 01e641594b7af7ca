export {
  getLogContext,
  LogContextSchema,
  runWithLogContext,
  setLogContextFields,
  type LogContext
} from './context.js';
export {
  createNoopLogger,
  createStructuredLogger,
  LogEventInputSchema,
  LogEventSchema,
  LogLevelSchema,
  type LogEvent,
  type LogEventInput,
  type LineSink,
  type LogLevel,
  type StructuredLogger,
  type StructuredLoggerOptions,
  type StructuredLogWriter
} from './logger.js';
export {sanitizeForLog} from './redaction.js';
