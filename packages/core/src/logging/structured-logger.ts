import type { WritableTarget } from '../reporting/formatting.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StructuredLogEvent {
  readonly level: LogLevel;
  readonly name: string;
  readonly event: string;
  readonly message?: string;
  readonly data?: Readonly<Record<string, unknown>>;
}

/**
 * Sink for the project's own diagnostics, such as configuration loading.
 */
export interface StructuredLogger {
  log(entry: StructuredLogEvent): void;
}

export class JsonLineLogger implements StructuredLogger {
  constructor(
    private readonly output: WritableTarget,
    private readonly now: () => Date = () => new Date(),
  ) {}

  log(entry: StructuredLogEvent): void {
    const payload = JSON.stringify({
      timestamp: this.now().toISOString(),
      ...entry,
    });
    this.output.write(`${payload}\n`);
  }
}

export const noopLogger: StructuredLogger = {
  log() {
    // noop
  },
};
