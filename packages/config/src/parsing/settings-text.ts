import path from 'node:path';

import { formatUnknownError } from '@evtlog/core';

import type { SettingsDocument } from './documents.js';
import { parseIniSettings } from './ini.js';
import { parseYamlSettings } from './yaml.js';

export type SettingsFormat = 'yaml' | 'ini';

export interface ParsedSettingsText {
  readonly format: SettingsFormat;
  readonly document: SettingsDocument;
}

/** Files with these extensions must be YAML; anything else may fall back to INI. */
export const YAML_EXTENSIONS: ReadonlySet<string> = new Set(['.yaml', '.yml']);

/**
 * Parses settings text from a file.
 *
 * @param text - File contents.
 * @param filePath - Path of the file, used to decide whether YAML is mandatory.
 * @returns The parsed document and the format it was read as.
 * @throws {Error} When the text is not YAML (for YAML extensions) or neither YAML nor INI.
 */
export function parseSettingsText(text: string, filePath: string): ParsedSettingsText {
  const yaml = parseYamlSettings(text);
  if (yaml.ok) {
    return { format: 'yaml', document: yaml.document };
  }

  if (YAML_EXTENSIONS.has(path.extname(filePath).toLowerCase())) {
    throw new Error(`Cannot parse as YAML: ${yaml.error.message}`, { cause: yaml.error });
  }

  try {
    return { format: 'ini', document: parseIniSettings(text) };
  } catch (error) {
    const reasons = `YAML: ${yaml.error.message}; INI: ${formatUnknownError(error)}`;
    throw new Error(`Cannot parse as either YAML or INI format (${reasons})`, { cause: error });
  }
}
