/**
 * Serialization format resolution
 */

import { isSerializationFormat, type SerializationFormat } from '../../types/Syntax.js';
import { InvalidArgumentValueError } from '../errors.js';
import { Flags, type ArgumentStore } from './argumentParser.js';

export const DEFAULT_SERIALIZATION_FORMAT: SerializationFormat = 'json';

const SERIALIZATION_FORMATS: readonly SerializationFormat[] = ['json', 'byteTree'];

/**
 * Absent or empty means json. Matching is exact and case sensitive.
 */
export function resolveSerializationFormat(store: ArgumentStore): SerializationFormat {
  const value = store.get(Flags.serializationFormat);
  if (value === undefined || value === '') {
    return DEFAULT_SERIALIZATION_FORMAT;
  }
  if (isSerializationFormat(value)) {
    return value;
  }
  throw new InvalidArgumentValueError(Flags.serializationFormat, value, SERIALIZATION_FORMATS);
}
