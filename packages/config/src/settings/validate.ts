import type { ZodIssue } from 'zod';

import { ConfigurationRejectedError } from '../errors.js';
import { LOGGING_SETTINGS_SCHEMA, type LoggingSettings } from './schema.js';

/**
 * Validates raw settings and applies defaults.
 *
 * @param value - Settings object, typically parsed from a file.
 * @returns The normalised settings with numeric levels.
 * @throws {ConfigurationRejectedError} When the settings are structurally invalid.
 */
export function validateLoggingSettings(value: unknown): LoggingSettings {
  const result = LOGGING_SETTINGS_SCHEMA.safeParse(value);
  if (!result.success) {
    throw new ConfigurationRejectedError(result.error.issues.map(formatIssue));
  }
  return result.data;
}

function formatIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
  return `${location}: ${issue.message}`;
}
