import { formatTimestamp } from '@evtlog/core';

import type { LogRecord } from '../records/log-record.js';

export const DEFAULT_RECORD_FORMAT = '{message}';

const FIELD_PATTERN = /\{(asctime|created|levelname|levelno|name|message)\}/g;

type RecordField = 'asctime' | 'created' | 'levelname' | 'levelno' | 'name' | 'message';

/**
 * Renders records through a brace pattern such as `{asctime} [{levelname}] {name}: {message}`.
 * Unrecognised braces are copied verbatim.
 */
export class RecordFormatter {
  constructor(readonly format: string = DEFAULT_RECORD_FORMAT) {}

  render(record: LogRecord): string {
    return this.format.replaceAll(FIELD_PATTERN, (_marker, field: RecordField) =>
      renderField(record, field),
    );
  }
}

function renderField(record: LogRecord, field: RecordField): string {
  switch (field) {
    case 'asctime': {
      return formatTimestamp(record.created);
    }
    case 'created': {
      return record.created.toFixed(6);
    }
    case 'levelname': {
      return record.levelName;
    }
    case 'levelno': {
      return String(record.severity);
    }
    case 'name': {
      return record.loggerName;
    }
    case 'message': {
      return record.message;
    }
    default: {
      const exhaustive: never = field;
      return exhaustive;
    }
  }
}
