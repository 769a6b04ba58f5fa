export {
  DEFAULT_KEY_VALUE_SEPARATOR,
  DEFAULT_PAIR_SEPARATOR,
  createAttributeEncoder,
  encodeAttributes,
  type AttributeEncoder,
  type AttributeEncoderOptions,
  type AttributeSet,
  type AttributeValue,
} from './encoder.js';
