import { severityName, Severity } from './severity.js';
import type { LogLevel, StructuredLogger } from './structured-logger.js';

/**
 * Receives fully formatted messages. Filtering, handler dispatch and output belong to the backend.
 */
export interface LogBackend {
  emit(severity: number, message: string): void;
}

/**
 * Maps a numeric severity onto the coarse structured logger levels.
 *
 * @param severity - Numeric severity.
 * @returns The structured level covering the severity.
 */
export function toLogLevel(severity: number): LogLevel {
  if (severity >= Severity.ERROR) {
    return 'error';
  }
  if (severity >= Severity.WARNING) {
    return 'warn';
  }
  if (severity >= Severity.INFO) {
    return 'info';
  }
  return 'debug';
}

/**
 * Adapts a {@link StructuredLogger} so formatted event messages can be sent to it.
 *
 * @param logger - Structured logger receiving one entry per message.
 * @param name - Logger name recorded on each entry.
 * @returns A backend forwarding every emission as an `evtlog.message` entry.
 */
export function createStructuredLoggerBackend(logger: StructuredLogger, name: string): LogBackend {
  return {
    emit(severity, message) {
      logger.log({
        level: toLogLevel(severity),
        name,
        event: 'evtlog.message',
        message,
        data: { severity: severityName(severity) },
      });
    },
  };
}
