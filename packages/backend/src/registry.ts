import { Severity, systemClock, type Clock } from '@evtlog/core';

import type { Handler } from './handlers/handler.js';
import { Logger } from './logger.js';

export const ROOT_LOGGER_NAME = 'root';

export interface LoggerRegistryOptions {
  /** Threshold of the root logger. Defaults to WARNING. */
  readonly rootLevel?: number;
  readonly clock?: Clock;
}

/**
 * Owns a tree of loggers addressed by dotted names (`app.db` is a child of `app`).
 */
export class LoggerRegistry {
  readonly root: Logger;
  private readonly loggers = new Map<string, Logger>();
  private readonly clock: Clock;

  constructor(options: LoggerRegistryOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.root = new Logger(ROOT_LOGGER_NAME, {
      level: options.rootLevel ?? Severity.WARNING,
      clock: this.clock,
    });
  }

  /**
   * Returns the logger for a name, creating it and any missing ancestors on first use.
   *
   * @param name - Dotted logger name; empty or `root` selects the root logger.
   * @returns The logger registered under the name.
   */
  getLogger(name?: string): Logger {
    if (name === undefined || name === '' || name === ROOT_LOGGER_NAME) {
      return this.root;
    }

    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const separator = name.lastIndexOf('.');
    const parent = separator === -1 ? this.root : this.getLogger(name.slice(0, separator));
    const logger = new Logger(name, { parent, clock: this.clock });
    this.loggers.set(name, logger);
    return logger;
  }

  /**
   * Lists every logger created so far, root first.
   */
  list(): readonly Logger[] {
    return [this.root, ...this.loggers.values()];
  }

  /**
   * Detaches and closes every handler once, even when shared between loggers.
   */
  async close(): Promise<void> {
    const handlers = new Set<Handler>();
    for (const logger of this.list()) {
      for (const handler of logger.handlers) {
        handlers.add(handler);
      }
      logger.clearHandlers();
    }
    await Promise.all([...handlers].map(async (handler) => handler.close()));
  }
}
