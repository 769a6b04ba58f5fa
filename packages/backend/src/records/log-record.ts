import { severityName, type Timestamp } from '@evtlog/core';

export interface LogRecord {
  readonly loggerName: string;
  readonly severity: number;
  readonly levelName: string;
  readonly message: string;
  /** Seconds since the Unix epoch at which the record was created. */
  readonly created: Timestamp;
}

export function createLogRecord(
  loggerName: string,
  severity: number,
  message: string,
  created: Timestamp,
): LogRecord {
  return {
    loggerName,
    severity,
    levelName: severityName(severity),
    message,
    created,
  };
}
