import { Severity, systemClock, type Clock, type LogBackend } from '@evtlog/core';

import { NOTSET, type Handler } from './handlers/handler.js';
import { createLogRecord } from './records/log-record.js';

export interface LoggerOptions {
  readonly parent?: Logger;
  readonly level?: number;
  readonly clock?: Clock;
}

/**
 * Named node of the logger hierarchy.
 *
 * A level of {@link NOTSET} defers to the nearest ancestor with a level. Records that pass the
 * effective level go to this logger's handlers and, while `propagate` holds, to its ancestors'.
 */
export class Logger implements LogBackend {
  readonly parent: Logger | undefined;
  level: number;
  propagate = true;
  private readonly attached: Handler[] = [];
  private readonly clock: Clock;

  constructor(
    readonly name: string,
    options: LoggerOptions = {},
  ) {
    this.parent = options.parent;
    this.level = options.level ?? NOTSET;
    this.clock = options.clock ?? systemClock;
  }

  get handlers(): readonly Handler[] {
    return this.attached;
  }

  addHandler(handler: Handler): void {
    if (!this.attached.includes(handler)) {
      this.attached.push(handler);
    }
  }

  removeHandler(handler: Handler): void {
    const index = this.attached.indexOf(handler);
    if (index !== -1) {
      this.attached.splice(index, 1);
    }
  }

  clearHandlers(): void {
    this.attached.length = 0;
  }

  getEffectiveLevel(): number {
    for (let current: Logger | undefined = this; current; current = current.parent) {
      if (current.level !== NOTSET) {
        return current.level;
      }
    }
    return NOTSET;
  }

  isEnabledFor(severity: number): boolean {
    return severity >= this.getEffectiveLevel();
  }

  emit(severity: number, message: string): void {
    if (!this.isEnabledFor(severity)) {
      return;
    }

    const record = createLogRecord(this.name, severity, message, this.clock());
    for (let current: Logger | undefined = this; current; current = current.parent) {
      for (const handler of current.attached) {
        handler.handle(record);
      }
      if (!current.propagate) {
        break;
      }
    }
  }

  debug(message: string): void {
    this.emit(Severity.DEBUG, message);
  }

  info(message: string): void {
    this.emit(Severity.INFO, message);
  }

  warning(message: string): void {
    this.emit(Severity.WARNING, message);
  }

  error(message: string): void {
    this.emit(Severity.ERROR, message);
  }

  critical(message: string): void {
    this.emit(Severity.CRITICAL, message);
  }
}
