import path from 'node:path';

import {
  FileHandler,
  LoggerRegistry,
  MemoryHandler,
  RecordFormatter,
  StreamHandler,
  type Handler,
} from '@evtlog/backend';
import {
  createEventFormatter,
  type Clock,
  type EventFormatter,
  type WritableTarget,
} from '@evtlog/core';

import {
  loadLoggingSettings,
  type LoadedSettingsFormat,
  type LoadLoggingSettingsOptions,
  type LoggingSettingsSource,
} from './loader.js';
import type { HandlerSettings, LoggingSettings } from './settings/schema.js';

export interface ConfigureLoggingOptions extends LoadLoggingSettingsOptions {
  readonly clock?: Clock;
  /** Replaces the process streams used by console handlers. */
  readonly streams?: Partial<Record<'stdout' | 'stderr', WritableTarget>>;
  /** Called by file handlers when their stream fails. */
  readonly onHandlerError?: (error: Error) => void;
}

export interface ConfiguredLogging {
  readonly settings: LoggingSettings;
  readonly format: LoadedSettingsFormat;
  readonly registry: LoggerRegistry;
  readonly formatter: EventFormatter;
  readonly handlers: ReadonlyMap<string, Handler>;
  close(): Promise<void>;
}

/**
 * Loads logging settings and builds the backend they describe, together with an event formatter
 * using the configured template mode and default level.
 *
 * @param source - Settings object or path of a YAML or INI file.
 * @param options - Loading options plus stream and clock overrides.
 * @returns The configured registry, formatter and named handlers.
 */
export async function configureLogging(
  source: LoggingSettingsSource,
  options: ConfigureLoggingOptions = {},
): Promise<ConfiguredLogging> {
  const loaded = await loadLoggingSettings(source, options);
  const { settings } = loaded;
  const baseDirectory = loaded.path
    ? path.dirname(loaded.path)
    : path.resolve(options.cwd ?? process.cwd());

  const formatters = new Map<string, RecordFormatter>(
    Object.entries(settings.formatters).map(([name, formatter]) => [
      name,
      new RecordFormatter(formatter.format),
    ]),
  );

  const handlers = new Map<string, Handler>();
  for (const [name, handlerSettings] of Object.entries(settings.handlers)) {
    const formatterName = handlerSettings.formatter;
    const formatter = formatterName === undefined ? undefined : formatters.get(formatterName);
    handlers.set(name, createHandler(handlerSettings, formatter, baseDirectory, options));
  }

  const registry = new LoggerRegistry({
    ...(settings.root?.level === undefined ? {} : { rootLevel: settings.root.level }),
    ...(options.clock ? { clock: options.clock } : {}),
  });
  attachHandlers(registry.root, settings.root?.handlers ?? [], handlers);

  for (const [name, loggerSettings] of Object.entries(settings.loggers)) {
    const logger = registry.getLogger(name);
    if (loggerSettings.level !== undefined) {
      logger.level = loggerSettings.level;
    }
    logger.propagate = loggerSettings.propagate;
    attachHandlers(logger, loggerSettings.handlers, handlers);
  }

  const formatter = createEventFormatter({
    includeTimestamp: settings.events?.includeTimestamp ?? true,
    ...(settings.events?.defaultLevel === undefined
      ? {}
      : { defaultSeverity: settings.events.defaultLevel }),
    ...(options.clock ? { clock: options.clock } : {}),
  });

  return {
    settings,
    format: loaded.format,
    registry,
    formatter,
    handlers,
    async close() {
      await registry.close();
      await Promise.all([...handlers.values()].map(async (handler) => handler.close()));
    },
  };
}

function createHandler(
  settings: HandlerSettings,
  formatter: RecordFormatter | undefined,
  baseDirectory: string,
  options: ConfigureLoggingOptions,
): Handler {
  const common = {
    ...(settings.level === undefined ? {} : { level: settings.level }),
    ...(formatter ? { formatter } : {}),
  };

  switch (settings.type) {
    case 'console': {
      const target = options.streams?.[settings.stream];
      return target
        ? new StreamHandler(target, common)
        : StreamHandler.forStandardStream(settings.stream, common);
    }
    case 'file': {
      return new FileHandler(path.resolve(baseDirectory, settings.path), {
        ...common,
        ...(options.onHandlerError ? { onError: options.onHandlerError } : {}),
      });
    }
    case 'memory': {
      return new MemoryHandler(common);
    }
    default: {
      const exhaustive: never = settings;
      return exhaustive;
    }
  }
}

function attachHandlers(
  logger: { addHandler(handler: Handler): void },
  names: readonly string[],
  handlers: ReadonlyMap<string, Handler>,
): void {
  for (const name of names) {
    const handler = handlers.get(name);
    if (handler) {
      logger.addHandler(handler);
    }
  }
}
