/**
 * @evtlog/core
 * Greppable event and activity messages: key-value encoding, templates and start/end timing.
 */

export {
  DEFAULT_KEY_VALUE_SEPARATOR,
  DEFAULT_PAIR_SEPARATOR,
  createAttributeEncoder,
  encodeAttributes,
  type AttributeEncoder,
  type AttributeEncoderOptions,
  type AttributeSet,
  type AttributeValue,
} from './attributes/index.js';

export {
  MESSAGE_TEMPLATES,
  SECTION_SEPARATOR,
  TemplateError,
  renderTemplate,
  selectTemplate,
  validateTemplate,
  type MessageShape,
  type MessageTemplates,
  type TemplateFields,
  type TemplatePlaceholder,
} from './templates/index.js';

export {
  computeDuration,
  formatTimestamp,
  markStart,
  systemClock,
  type Clock,
  type Timestamp,
} from './timing/index.js';

export {
  createEventFormatter,
  defaultEventFormatter,
  end,
  event,
  start,
  wrapActivity,
  type EmitOptions,
  type EndOptions,
  type EventFormatter,
  type EventFormatterOptions,
  type EventOptions,
  type MessageFields,
  type WrapActivityOptions,
} from './events/index.js';

export {
  DEFAULT_SEVERITY,
  JsonLineLogger,
  Severity,
  createStructuredLoggerBackend,
  noopLogger,
  parseSeverity,
  severityName,
  toLogLevel,
  type LogBackend,
  type LogLevel,
  type SeverityName,
  type StructuredLogEvent,
  type StructuredLogger,
} from './logging/index.js';

export {
  formatUnknownError,
  serialiseError,
  writeLine,
  type WritableTarget,
} from './reporting/index.js';
