export type MessageShape = 'entry' | 'exit' | 'exitWithoutDuration' | 'event';

export type TemplatePlaceholder = 'name' | 'kvp' | 'dur' | 'status' | 'timestamp';

export type MessageTemplates = Readonly<Record<MessageShape, string>>;

export type TemplateFields = Readonly<Partial<Record<TemplatePlaceholder, string>>>;

/** Placed between the templated prefix and the key-value fragment. */
export const SECTION_SEPARATOR = ' ; ';

const KVP = `${SECTION_SEPARATOR}{kvp}`;

export const MESSAGE_TEMPLATES: Readonly<{
  readonly plain: MessageTemplates;
  readonly timestamped: MessageTemplates;
}> = Object.freeze({
  plain: Object.freeze({
    entry: `{name}.begin${KVP}`,
    exit: `{name}.end ({dur})${KVP}`,
    exitWithoutDuration: `{name}.end${KVP}`,
    event: `{name}${KVP}`,
  }),
  timestamped: Object.freeze({
    entry: `{timestamp} {name}.begin${KVP}`,
    exit: `{timestamp} {name}.end ({dur})${KVP}`,
    exitWithoutDuration: `{timestamp} {name}.end${KVP}`,
    event: `{timestamp} {name}${KVP}`,
  }),
});

const SHAPE_PLACEHOLDERS: Readonly<Record<MessageShape, ReadonlySet<TemplatePlaceholder>>> = {
  entry: new Set<TemplatePlaceholder>(['name', 'kvp', 'timestamp']),
  exit: new Set<TemplatePlaceholder>(['name', 'kvp', 'timestamp', 'dur', 'status']),
  exitWithoutDuration: new Set<TemplatePlaceholder>(['name', 'kvp', 'timestamp', 'status']),
  event: new Set<TemplatePlaceholder>(['name', 'kvp', 'timestamp']),
};

const PLACEHOLDER_PATTERN = /\{([^{}]*)\}/g;

/**
 * Error thrown when a message template references a placeholder its shape cannot fill.
 */
export class TemplateError extends Error {
  constructor(
    message: string,
    readonly template: string,
  ) {
    super(message);
    this.name = 'TemplateError';
  }
}

/**
 * Returns the built-in template for a shape.
 *
 * @param shape - Message shape being produced.
 * @param includeTimestamp - Whether the template family embeds a timestamp.
 * @returns The template string.
 */
export function selectTemplate(shape: MessageShape, includeTimestamp: boolean): string {
  const family = includeTimestamp ? MESSAGE_TEMPLATES.timestamped : MESSAGE_TEMPLATES.plain;
  return family[shape];
}

/**
 * Checks that every placeholder in a template can be filled for the given shape.
 *
 * @param template - Template to check.
 * @param shape - Shape the template will be rendered for.
 * @throws {TemplateError} When the template names an unknown or unavailable placeholder.
 */
export function validateTemplate(template: string, shape: MessageShape): void {
  const allowed = SHAPE_PLACEHOLDERS[shape];
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const placeholder = match[1] ?? '';
    if (!isPlaceholder(placeholder)) {
      throw new TemplateError(
        `Unknown placeholder {${placeholder}} in template "${template}"`,
        template,
      );
    }
    if (!allowed.has(placeholder)) {
      throw new TemplateError(
        `Placeholder {${placeholder}} is not available for ${shape} messages`,
        template,
      );
    }
  }
}

/**
 * Substitutes placeholders with field values. Missing fields render as empty strings.
 *
 * @param template - Template containing `{placeholder}` markers.
 * @param fields - Values for the placeholders.
 * @returns The rendered message.
 */
export function renderTemplate(template: string, fields: TemplateFields): string {
  return template.replaceAll(PLACEHOLDER_PATTERN, (marker, placeholder: string) =>
    isPlaceholder(placeholder) ? (fields[placeholder] ?? '') : marker,
  );
}

function isPlaceholder(value: string): value is TemplatePlaceholder {
  return (
    value === 'name' ||
    value === 'kvp' ||
    value === 'dur' ||
    value === 'status' ||
    value === 'timestamp'
  );
}
