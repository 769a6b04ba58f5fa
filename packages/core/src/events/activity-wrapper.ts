import type { AttributeSet } from '../attributes/encoder.js';
import type { LogBackend } from '../logging/log-backend.js';
import type { Timestamp } from '../timing/activity-timer.js';
import { defaultEventFormatter, type EventFormatter } from './event-formatter.js';

export interface WrapActivityOptions {
  /** Activity name; defaults to the callable's declared name. */
  readonly name?: string;
  readonly severity?: number;
  /** Attached to both the begin and the end message. */
  readonly attributes?: AttributeSet;
  readonly formatter?: EventFormatter;
  /**
   * When set, a failed invocation still logs its end, carrying this status code, before the
   * failure is rethrown. Without it a failure skips the end message.
   */
  readonly failureStatusCode?: number;
}

/**
 * Brackets a callable with begin/end activity messages.
 *
 * The result is returned unchanged; a promise result is awaited before the end message is logged.
 * Failures propagate untouched.
 *
 * @param backend - Backend receiving the messages.
 * @param fn - Function or method to instrument. `this` is forwarded.
 * @param options - Name, severity, attributes and formatter.
 * @returns A function with the same signature as `fn`.
 * @throws {TypeError} When no name is given and `fn` is anonymous.
 */
export function wrapActivity<This, Args extends unknown[], Result>(
  backend: LogBackend,
  fn: (this: This, ...args: Args) => Result,
  options?: WrapActivityOptions,
): (this: This, ...args: Args) => Result;
export function wrapActivity<This, Args extends unknown[]>(
  backend: LogBackend,
  fn: (this: This, ...args: Args) => unknown,
  options: WrapActivityOptions = {},
): (this: This, ...args: Args) => unknown {
  const name = options.name ?? fn.name;
  if (name.length === 0) {
    throw new TypeError('wrapActivity requires a name for anonymous functions');
  }

  const formatter = options.formatter ?? defaultEventFormatter;
  const { severity, attributes, failureStatusCode } = options;

  const logEnd = (started: Timestamp, statusCode?: number): void => {
    formatter.end(backend, name, { start: started, severity, attributes, statusCode });
  };

  const logFailure = (started: Timestamp): void => {
    if (failureStatusCode !== undefined) {
      logEnd(started, failureStatusCode);
    }
  };

  return function (this: This, ...args: Args): unknown {
    const started = formatter.start(backend, name, { severity, attributes });

    let result: unknown;
    try {
      result = fn.apply(this, args);
    } catch (error) {
      logFailure(started);
      throw error;
    }

    if (result instanceof Promise) {
      return settle(result, started);
    }

    logEnd(started);
    return result;
  };

  async function settle(pending: Promise<unknown>, started: Timestamp): Promise<unknown> {
    let value: unknown;
    try {
      value = await pending;
    } catch (error) {
      logFailure(started);
      throw error;
    }
    logEnd(started);
    return value;
  }
}
