export {
  createEventFormatter,
  defaultEventFormatter,
  end,
  event,
  start,
  type EmitOptions,
  type EndOptions,
  type EventFormatter,
  type EventFormatterOptions,
  type EventOptions,
  type MessageFields,
} from './event-formatter.js';
export { wrapActivity, type WrapActivityOptions } from './activity-wrapper.js';
