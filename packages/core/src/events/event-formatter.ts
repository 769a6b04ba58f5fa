import {
  createAttributeEncoder,
  type AttributeEncoderOptions,
  type AttributeSet,
} from '../attributes/encoder.js';
import type { LogBackend } from '../logging/log-backend.js';
import { DEFAULT_SEVERITY } from '../logging/severity.js';
import {
  renderTemplate,
  selectTemplate,
  validateTemplate,
  type MessageShape,
  type MessageTemplates,
} from '../templates/message-templates.js';
import {
  computeDuration,
  formatTimestamp,
  markStart,
  systemClock,
  type Clock,
  type Timestamp,
} from '../timing/activity-timer.js';

export interface EventFormatterOptions {
  /** Prefix every message with its own ISO-8601 timestamp. Defaults to `true`. */
  readonly includeTimestamp?: boolean;
  readonly defaultSeverity?: number;
  readonly clock?: Clock;
  readonly encoder?: AttributeEncoderOptions;
  /** Replaces built-in templates per shape; checked when the formatter is created. */
  readonly templates?: Partial<MessageTemplates>;
}

export interface EmitOptions {
  readonly severity?: number;
  readonly attributes?: AttributeSet;
}

export interface EventOptions extends EmitOptions {
  /** One-off template for this event, checked before anything is emitted. */
  readonly template?: string;
}

export interface EndOptions extends EmitOptions {
  /** Handle returned by {@link EventFormatter.start}; omit it to log the end without a duration. */
  readonly start?: Timestamp;
  /** Opaque outcome code, `0` for success. Only custom templates display it. */
  readonly statusCode?: number;
}

export interface MessageFields {
  readonly timestamp: Timestamp;
  readonly attributes?: AttributeSet;
  readonly duration?: string;
  readonly statusCode?: number;
  readonly template?: string;
}

export interface EventFormatter {
  readonly includeTimestamp: boolean;
  readonly defaultSeverity: number;
  event(backend: LogBackend, name: string, options?: EventOptions): Timestamp;
  start(backend: LogBackend, name: string, options?: EmitOptions): Timestamp;
  end(backend: LogBackend, name: string, options?: EndOptions): void;
  formatMessage(shape: MessageShape, name: string, fields: MessageFields): string;
}

const SHAPES: readonly MessageShape[] = ['entry', 'exit', 'exitWithoutDuration', 'event'];

/**
 * Creates a formatter that renders event and activity messages and hands them to a backend.
 *
 * The template mode is fixed for the lifetime of the formatter.
 *
 * @param options - Template mode, default severity, clock and encoding overrides.
 * @returns A formatter instance.
 * @throws {TemplateError} When a template override names a placeholder its shape cannot fill.
 */
export function createEventFormatter(options: EventFormatterOptions = {}): EventFormatter {
  const includeTimestamp = options.includeTimestamp ?? true;
  const defaultSeverity = options.defaultSeverity ?? DEFAULT_SEVERITY;
  const clock = options.clock ?? systemClock;
  const encode = createAttributeEncoder(options.encoder);
  const templates = resolveTemplates(includeTimestamp, options.templates);

  const formatMessage = (shape: MessageShape, name: string, fields: MessageFields): string => {
    const template = fields.template ?? templates[shape];
    return renderTemplate(template, {
      name,
      kvp: encode(fields.attributes),
      timestamp: formatTimestamp(fields.timestamp),
      ...(fields.duration === undefined ? {} : { dur: fields.duration }),
      ...(fields.statusCode === undefined ? {} : { status: String(fields.statusCode) }),
    });
  };

  const emit = (backend: LogBackend, severity: number | undefined, message: string): void => {
    backend.emit(severity ?? defaultSeverity, message);
  };

  return Object.freeze({
    includeTimestamp,
    defaultSeverity,
    formatMessage,

    event(backend: LogBackend, name: string, eventOptions: EventOptions = {}): Timestamp {
      if (eventOptions.template !== undefined) {
        validateTemplate(eventOptions.template, 'event');
      }
      const now = markStart(clock);
      emit(
        backend,
        eventOptions.severity,
        formatMessage('event', name, {
          timestamp: now,
          attributes: eventOptions.attributes,
          template: eventOptions.template,
        }),
      );
      return now;
    },

    start(backend: LogBackend, name: string, startOptions: EmitOptions = {}): Timestamp {
      const now = markStart(clock);
      emit(
        backend,
        startOptions.severity,
        formatMessage('entry', name, { timestamp: now, attributes: startOptions.attributes }),
      );
      return now;
    },

    end(backend: LogBackend, name: string, endOptions: EndOptions = {}): void {
      const now = clock();
      const statusCode = endOptions.statusCode ?? 0;
      const message =
        endOptions.start === undefined
          ? formatMessage('exitWithoutDuration', name, {
              timestamp: now,
              attributes: endOptions.attributes,
              statusCode,
            })
          : formatMessage('exit', name, {
              timestamp: now,
              attributes: endOptions.attributes,
              duration: computeDuration(endOptions.start, now),
              statusCode,
            });
      emit(backend, endOptions.severity, message);
    },
  });
}

function resolveTemplates(
  includeTimestamp: boolean,
  overrides: Partial<MessageTemplates> = {},
): MessageTemplates {
  const resolved: Record<MessageShape, string> = {
    entry: selectTemplate('entry', includeTimestamp),
    exit: selectTemplate('exit', includeTimestamp),
    exitWithoutDuration: selectTemplate('exitWithoutDuration', includeTimestamp),
    event: selectTemplate('event', includeTimestamp),
  };

  for (const shape of SHAPES) {
    const override = overrides[shape];
    if (override === undefined) {
      continue;
    }
    validateTemplate(override, shape);
    resolved[shape] = override;
  }

  return resolved;
}

/**
 * Formatter used by the module-level {@link event}, {@link start} and {@link end} helpers:
 * timestamped messages at INFO severity.
 */
export const defaultEventFormatter: EventFormatter = createEventFormatter();

/**
 * Logs a single event with the default formatter.
 *
 * @returns The timestamp the event was logged at.
 */
export function event(backend: LogBackend, name: string, options?: EventOptions): Timestamp {
  return defaultEventFormatter.event(backend, name, options);
}

/**
 * Logs the start of an activity with the default formatter.
 *
 * @returns The handle to pass as `start` when the activity ends.
 */
export function start(backend: LogBackend, name: string, options?: EmitOptions): Timestamp {
  return defaultEventFormatter.start(backend, name, options);
}

/**
 * Logs the end of an activity with the default formatter.
 */
export function end(backend: LogBackend, name: string, options?: EndOptions): void {
  defaultEventFormatter.end(backend, name, options);
}
