import { parse } from 'yaml';

import { isSettingsDocument, type SettingsDocument } from './documents.js';

export type YamlParseResult =
  | { readonly ok: true; readonly document: SettingsDocument }
  | { readonly ok: false; readonly error: Error };

/**
 * Parses YAML text that must hold a mapping at the top level.
 *
 * @param text - File contents.
 * @returns The mapping, or the reason the text is not a YAML mapping.
 */
export function parseYamlSettings(text: string): YamlParseResult {
  let value: unknown;
  try {
    value = parse(text);
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }

  if (!isSettingsDocument(value)) {
    return { ok: false, error: new Error('YAML document is not a mapping') };
  }
  return { ok: true, document: value };
}
