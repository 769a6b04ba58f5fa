export type AttributeValue = string | number | boolean | null;

/**
 * Attributes attached to an event or activity. Record entries set to `undefined` are skipped.
 */
export type AttributeSet =
  | Readonly<Record<string, AttributeValue | undefined>>
  | ReadonlyMap<string, AttributeValue>;

export interface AttributeEncoderOptions {
  /** Placed between one `key=value` pair and the next. Defaults to `,`. */
  readonly pairSeparator?: string;
  /** Placed between a key and its value. Defaults to `=`. */
  readonly keyValueSeparator?: string;
}

export type AttributeEncoder = (attributes: AttributeSet | undefined) => string;

export const DEFAULT_PAIR_SEPARATOR = ',';
export const DEFAULT_KEY_VALUE_SEPARATOR = '=';

const EMPTY_STRING_VALUE = "''";

/**
 * Encodes attributes into a single `k1=v1,k2=v2` fragment.
 *
 * String values containing the pair separator get a backslash before each occurrence of it, and
 * empty strings render as `''`. Keys are written as given.
 *
 * @param attributes - Attributes to encode.
 * @param options - Separator overrides.
 * @returns The encoded fragment, or an empty string when there are no attributes.
 */
export function encodeAttributes(
  attributes: AttributeSet | undefined,
  options: AttributeEncoderOptions = {},
): string {
  const pairSeparator = options.pairSeparator ?? DEFAULT_PAIR_SEPARATOR;
  const keyValueSeparator = options.keyValueSeparator ?? DEFAULT_KEY_VALUE_SEPARATOR;
  const pairs: string[] = [];

  for (const [key, value] of entriesOf(attributes)) {
    pairs.push(`${key}${keyValueSeparator}${encodeValue(value, pairSeparator)}`);
  }

  return pairs.join(pairSeparator);
}

/**
 * Binds {@link encodeAttributes} to a fixed set of separators.
 *
 * @param options - Separator overrides.
 * @returns An encoder function.
 */
export function createAttributeEncoder(options: AttributeEncoderOptions = {}): AttributeEncoder {
  const bound: AttributeEncoderOptions = { ...options };
  return (attributes) => encodeAttributes(attributes, bound);
}

function encodeValue(value: AttributeValue, pairSeparator: string): string {
  if (typeof value !== 'string') {
    return String(value);
  }
  if (value.length === 0) {
    return EMPTY_STRING_VALUE;
  }
  if (pairSeparator.length > 0 && value.includes(pairSeparator)) {
    return value.replaceAll(pairSeparator, `\\${pairSeparator}`);
  }
  return value;
}

function* entriesOf(
  attributes: AttributeSet | undefined,
): Generator<readonly [string, AttributeValue]> {
  if (attributes === undefined) {
    return;
  }
  if (isAttributeMap(attributes)) {
    yield* attributes.entries();
    return;
  }
  for (const [key, value] of Object.entries(attributes)) {
    if (value === undefined) {
      continue;
    }
    yield [key, value];
  }
}

function isAttributeMap(
  attributes: AttributeSet,
): attributes is ReadonlyMap<string, AttributeValue> {
  return attributes instanceof Map;
}
