/**
 * Numeric severities understood by every {@link LogBackend}. Higher values are more severe.
 */
export const Severity = Object.freeze({
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
} as const);

export type SeverityName = keyof typeof Severity;

export const DEFAULT_SEVERITY: number = Severity.INFO;

const SEVERITY_NAMES: ReadonlyMap<number, SeverityName> = new Map<number, SeverityName>([
  [Severity.DEBUG, 'DEBUG'],
  [Severity.INFO, 'INFO'],
  [Severity.WARNING, 'WARNING'],
  [Severity.ERROR, 'ERROR'],
  [Severity.CRITICAL, 'CRITICAL'],
]);

/**
 * Returns the canonical name of a severity, or `Level <n>` for values without one.
 *
 * @param severity - Numeric severity.
 * @returns Display name for the severity.
 */
export function severityName(severity: number): string {
  return SEVERITY_NAMES.get(severity) ?? `Level ${severity}`;
}

/**
 * Resolves a severity given either as a number or as a case-insensitive name.
 *
 * @param value - Severity number or name such as `info` or `WARNING`.
 * @returns The numeric severity, or `undefined` when the name is unknown.
 */
export function parseSeverity(value: number | string): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : undefined;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10);
  }

  const upper = trimmed.toUpperCase();
  if (upper === 'WARN') {
    return Severity.WARNING;
  }
  if (upper === 'FATAL') {
    return Severity.CRITICAL;
  }
  return isSeverityName(upper) ? Severity[upper] : undefined;
}

function isSeverityName(value: string): value is SeverityName {
  return Object.prototype.hasOwnProperty.call(Severity, value);
}
