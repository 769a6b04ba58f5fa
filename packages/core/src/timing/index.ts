export {
  computeDuration,
  formatTimestamp,
  markStart,
  systemClock,
  type Clock,
  type Timestamp,
} from './activity-timer.js';
