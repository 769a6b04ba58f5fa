import { parseSeverity } from '@evtlog/core';
import { z } from 'zod';

const LEVEL_SCHEMA = z
  .union([z.number(), z.string()])
  .transform((value: number | string, ctx: z.RefinementCtx) => {
    const level = parseSeverity(value);
    if (level === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown level "${String(value)}"`,
      });
      return z.NEVER;
    }
    return level;
  });

const FORMATTER_SCHEMA = z
  .object({
    format: z.string(),
  })
  .strict();

const HANDLER_COMMON = {
  level: LEVEL_SCHEMA.optional(),
  formatter: z.string().optional(),
};

const HANDLER_SCHEMA = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('console'),
      stream: z.enum(['stdout', 'stderr']).default('stderr'),
      ...HANDLER_COMMON,
    })
    .strict(),
  z
    .object({
      type: z.literal('file'),
      path: z.string().min(1),
      ...HANDLER_COMMON,
    })
    .strict(),
  z
    .object({
      type: z.literal('memory'),
      ...HANDLER_COMMON,
    })
    .strict(),
]);

const LOGGER_SCHEMA = z
  .object({
    level: LEVEL_SCHEMA.optional(),
    handlers: z.array(z.string()).default([]),
    propagate: z.boolean().default(true),
  })
  .strict();

const ROOT_SCHEMA = z
  .object({
    level: LEVEL_SCHEMA.optional(),
    handlers: z.array(z.string()).default([]),
  })
  .strict();

const EVENTS_SCHEMA = z
  .object({
    includeTimestamp: z.boolean().default(true),
    defaultLevel: LEVEL_SCHEMA.optional(),
  })
  .strict();

export const LOGGING_SETTINGS_SCHEMA = z
  .object({
    version: z.literal(1),
    formatters: z.record(FORMATTER_SCHEMA).default({}),
    handlers: z.record(HANDLER_SCHEMA).default({}),
    loggers: z.record(LOGGER_SCHEMA).default({}),
    root: ROOT_SCHEMA.optional(),
    events: EVENTS_SCHEMA.optional(),
  })
  .strict()
  .superRefine((settings, ctx: z.RefinementCtx) => {
    for (const [name, handler] of Object.entries(settings.handlers)) {
      if (handler.formatter !== undefined && !(handler.formatter in settings.formatters)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['handlers', name, 'formatter'],
          message: `Unknown formatter "${handler.formatter}"`,
        });
      }
    }

    const references: [readonly (string | number)[], readonly string[]][] = Object.entries(
      settings.loggers,
    ).map(([name, logger]) => [['loggers', name, 'handlers'], logger.handlers]);
    if (settings.root) {
      references.push([['root', 'handlers'], settings.root.handlers]);
    }

    for (const [path, handlers] of references) {
      for (const handler of handlers) {
        if (!(handler in settings.handlers)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [...path],
            message: `Unknown handler "${handler}"`,
          });
        }
      }
    }
  });

export type LoggingSettings = z.output<typeof LOGGING_SETTINGS_SCHEMA>;
export type LoggingSettingsInput = z.input<typeof LOGGING_SETTINGS_SCHEMA>;
export type HandlerSettings = LoggingSettings['handlers'][string];
export type LoggerSettings = LoggingSettings['loggers'][string];
