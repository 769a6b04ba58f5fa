export {
  JsonLineLogger,
  noopLogger,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './structured-logger.js';
export { createStructuredLoggerBackend, toLogLevel, type LogBackend } from './log-backend.js';
export {
  DEFAULT_SEVERITY,
  Severity,
  parseSeverity,
  severityName,
  type SeverityName,
} from './severity.js';
