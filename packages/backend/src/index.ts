/**
 * @evtlog/backend
 * Logger hierarchy receiving formatted event messages.
 */

export { DEFAULT_RECORD_FORMAT, RecordFormatter } from './formatters/record-formatter.js';
export { FileHandler, type FileHandlerOptions } from './handlers/file-handler.js';
export { FormattingHandler, NOTSET, type Handler, type HandlerOptions } from './handlers/handler.js';
export { MemoryHandler } from './handlers/memory-handler.js';
export { StreamHandler, type StandardStream } from './handlers/stream-handler.js';
export { Logger, type LoggerOptions } from './logger.js';
export { createLogRecord, type LogRecord } from './records/log-record.js';
export { LoggerRegistry, ROOT_LOGGER_NAME, type LoggerRegistryOptions } from './registry.js';
