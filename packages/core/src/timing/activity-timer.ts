/** Wall-clock seconds since the Unix epoch, with a fractional part. */
export type Timestamp = number;

export type Clock = () => Timestamp;

const DURATION_DIGITS = 6;
const MICROSECONDS_PER_SECOND = 1_000_000;

/**
 * Reads the wall clock, so it follows changes to the system time.
 */
export const systemClock: Clock = () => Date.now() / 1000;

/**
 * Captures the start of an activity.
 *
 * @param clock - Time source, {@link systemClock} by default.
 * @returns The start timestamp the caller holds until the activity ends.
 */
export function markStart(clock: Clock = systemClock): Timestamp {
  return clock();
}

/**
 * Formats the time elapsed between two timestamps as seconds with six decimals.
 *
 * @param start - Timestamp captured when the activity began.
 * @param end - Timestamp captured when the activity ended.
 * @returns Elapsed seconds such as `5.000000`; never negative.
 */
export function computeDuration(start: Timestamp, end: Timestamp): string {
  return Math.max(0, end - start).toFixed(DURATION_DIGITS);
}

/**
 * Renders a timestamp as ISO-8601 local time with microseconds and no offset,
 * e.g. `2024-01-02T03:04:05.678901`.
 *
 * @param timestamp - Seconds since the Unix epoch.
 * @returns The formatted timestamp.
 */
export function formatTimestamp(timestamp: Timestamp): string {
  const micros = Math.round(timestamp * MICROSECONDS_PER_SECOND);
  const fraction =
    ((micros % MICROSECONDS_PER_SECOND) + MICROSECONDS_PER_SECOND) % MICROSECONDS_PER_SECOND;
  const date = new Date((micros - fraction) / 1000);

  const year = String(date.getFullYear()).padStart(4, '0');
  const month = pad(date.getMonth() + 1);
  const day = pad(date.getDate());
  const hours = pad(date.getHours());
  const minutes = pad(date.getMinutes());
  const seconds = pad(date.getSeconds());

  const micro = String(fraction).padStart(6, '0');

  return `${year}-${month}-${day}T${hours}:${minutes}:${seconds}.${micro}`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}
