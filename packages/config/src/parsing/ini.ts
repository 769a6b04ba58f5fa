import ini from 'ini';

import { isSettingsDocument, type SettingsDocument } from './documents.js';

const ROOT = 'root';

/**
 * Converts the classic sectioned logging layout into a settings document:
 *
 * ```ini
 * [loggers]
 * keys=root,worker
 *
 * [handlers]
 * keys=console
 *
 * [formatters]
 * keys=basic
 *
 * [logger_root]
 * level=WARNING
 * handlers=console
 *
 * [logger_worker]
 * qualname=app.worker
 * level=DEBUG
 * handlers=console
 * propagate=0
 *
 * [handler_console]
 * class=console
 * stream=stdout
 * formatter=basic
 *
 * [formatter_basic]
 * format={levelname} {message}
 *
 * [events]
 * includeTimestamp=false
 * ```
 *
 * @param text - INI file contents.
 * @returns A settings document ready for validation.
 * @throws {Error} When the text has no `[loggers]` section.
 */
export function parseIniSettings(text: string): SettingsDocument {
  const parsed: unknown = ini.parse(text);
  if (!isSettingsDocument(parsed) || !isSettingsDocument(parsed['loggers'])) {
    throw new Error('INI document has no [loggers] section');
  }

  const formatters: Record<string, unknown> = {};
  for (const key of listKeys(parsed['formatters'])) {
    const section = requireSection(parsed, `formatter_${key}`);
    formatters[key] = compact({ format: section['format'] });
  }

  const handlers: Record<string, unknown> = {};
  for (const key of listKeys(parsed['handlers'])) {
    const section = requireSection(parsed, `handler_${key}`);
    handlers[key] = compact({
      type: section['type'] ?? section['class'],
      level: section['level'],
      formatter: section['formatter'],
      stream: section['stream'],
      path: section['path'],
    });
  }

  const loggers: Record<string, unknown> = {};
  let root: unknown;
  for (const key of listKeys(parsed['loggers'])) {
    const section = requireSection(parsed, `logger_${key}`);
    const handlerNames = listKeys(section['handlers']);
    if (key === ROOT) {
      root = compact({ level: section['level'], handlers: handlerNames });
      continue;
    }
    const name = typeof section['qualname'] === 'string' ? section['qualname'] : key;
    loggers[name] = compact({
      level: section['level'],
      handlers: handlerNames,
      propagate: parseFlag(section['propagate']),
    });
  }

  const eventSection = parsed['events'];
  const events = isSettingsDocument(eventSection)
    ? compact({
        includeTimestamp: parseFlag(eventSection['includeTimestamp']),
        defaultLevel: eventSection['defaultLevel'],
      })
    : undefined;

  return compact({ version: 1, formatters, handlers, loggers, root, events });
}

function requireSection(parsed: SettingsDocument, name: string): SettingsDocument {
  const section = findSection(parsed, name);
  if (!section) {
    throw new Error(`INI document has no [${name}] section`);
  }
  return section;
}

// `ini` nests dotted headers: `[logger_app.db]` is stored under `logger_app` then `db`.
function findSection(parsed: SettingsDocument, name: string): SettingsDocument | undefined {
  const direct = parsed[name];
  if (isSettingsDocument(direct)) {
    return direct;
  }

  let current: unknown = parsed;
  for (const part of name.split('.')) {
    if (!isSettingsDocument(current)) {
      return undefined;
    }
    current = current[part];
  }
  return isSettingsDocument(current) ? current : undefined;
}

function listKeys(value: unknown): string[] {
  const raw = isSettingsDocument(value) ? value['keys'] : value;
  if (typeof raw !== 'string') {
    return [];
  }
  return raw
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
}

function parseFlag(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'yes':
    case 'on':
    case 'true': {
      return true;
    }
    case '0':
    case 'no':
    case 'off':
    case 'false': {
      return false;
    }
    default: {
      return value;
    }
  }
}

function compact(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}
