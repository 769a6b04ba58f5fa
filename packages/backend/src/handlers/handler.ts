import { RecordFormatter } from '../formatters/record-formatter.js';
import type { LogRecord } from '../records/log-record.js';

/** Level that lets every record through. */
export const NOTSET = 0;

export interface HandlerOptions {
  readonly level?: number;
  readonly formatter?: RecordFormatter;
}

export interface Handler {
  readonly level: number;
  handle(record: LogRecord): void;
  close(): void | Promise<void>;
}

/**
 * Applies the handler threshold and formatter, leaving output to subclasses.
 */
export abstract class FormattingHandler implements Handler {
  readonly level: number;
  protected readonly formatter: RecordFormatter;

  protected constructor(options: HandlerOptions = {}) {
    this.level = options.level ?? NOTSET;
    this.formatter = options.formatter ?? new RecordFormatter();
  }

  handle(record: LogRecord): void {
    if (record.severity < this.level) {
      return;
    }
    this.write(this.formatter.render(record), record);
  }

  close(): void | Promise<void> {
    // nothing to release by default
  }

  protected abstract write(line: string, record: LogRecord): void;
}
