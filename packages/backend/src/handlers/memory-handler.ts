import type { LogRecord } from '../records/log-record.js';
import { FormattingHandler, type HandlerOptions } from './handler.js';

/**
 * Keeps formatted lines and their records in memory.
 */
export class MemoryHandler extends FormattingHandler {
  private readonly captured: { line: string; record: LogRecord }[] = [];

  constructor(options: HandlerOptions = {}) {
    super(options);
  }

  get lines(): readonly string[] {
    return this.captured.map((entry) => entry.line);
  }

  get records(): readonly LogRecord[] {
    return this.captured.map((entry) => entry.record);
  }

  clear(): void {
    this.captured.length = 0;
  }

  protected override write(line: string, record: LogRecord): void {
    this.captured.push({ line, record });
  }
}
