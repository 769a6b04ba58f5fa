import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { noopLogger, serialiseError, type StructuredLogger } from '@evtlog/core';

import { ConfigurationLoadError } from './errors.js';
import { parseSettingsText } from './parsing/settings-text.js';
import type { LoggingSettings, LoggingSettingsInput } from './settings/schema.js';
import { validateLoggingSettings } from './settings/validate.js';

/** A settings object, or the path of a YAML or INI file holding one. */
export type LoggingSettingsSource = LoggingSettingsInput | string;

export type LoadedSettingsFormat = 'object' | 'yaml' | 'ini';

export interface LoadLoggingSettingsOptions {
  /** Base directory for relative paths. Defaults to `process.cwd()`. */
  readonly cwd?: string;
  readonly logger?: StructuredLogger;
}

export interface LoadedLoggingSettings {
  readonly settings: LoggingSettings;
  readonly format: LoadedSettingsFormat;
  /** Absolute path of the file the settings came from. */
  readonly path?: string;
}

const LOGGER_NAME = 'evtlog.config';

/**
 * Resolves a settings object or file into validated logging settings.
 *
 * @param source - Settings object or file path.
 * @param options - Working directory and diagnostics logger.
 * @returns The validated settings with their origin.
 * @throws {ConfigurationRejectedError} When a settings object is invalid.
 * @throws {ConfigurationLoadError} When a file cannot be read, parsed or validated.
 */
export async function loadLoggingSettings(
  source: LoggingSettingsSource,
  options: LoadLoggingSettingsOptions = {},
): Promise<LoadedLoggingSettings> {
  const logger = options.logger ?? noopLogger;

  if (typeof source !== 'string') {
    const settings = validateLoggingSettings(source);
    logger.log({
      level: 'debug',
      name: LOGGER_NAME,
      event: 'config.load',
      data: { format: 'object' },
    });
    return { settings, format: 'object' };
  }

  const filePath = path.resolve(options.cwd ?? process.cwd(), source);
  try {
    const text = await readFile(filePath, 'utf8');
    const parsed = parseSettingsText(text, filePath);
    const settings = validateLoggingSettings(parsed.document);
    logger.log({
      level: 'debug',
      name: LOGGER_NAME,
      event: 'config.load',
      data: { format: parsed.format, path: filePath },
    });
    return { settings, format: parsed.format, path: filePath };
  } catch (error) {
    logger.log({
      level: 'error',
      name: LOGGER_NAME,
      event: 'config.load.failed',
      data: { path: filePath, error: serialiseError(error) },
    });
    throw new ConfigurationLoadError(filePath, error);
  }
}
