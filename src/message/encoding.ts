import { SerializationError } from '../errors/index';
import type { MessageFormat } from './message';

// A high surrogate not followed by a low one, or a low surrogate not preceded by a high one
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

// Code units outside the XML 1.0 Char production; surrogates are checked as pairs elsewhere
const XML_FORBIDDEN_CHAR = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/;

export interface EncodableField {
  name: string;
  value: string;
}

function describeCodeUnit(value: string, index: number): string {
  const code = value.charCodeAt(index);
  return `U+${code.toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * Rejects values that cannot be written as UTF-8.
 */
export function assertUtf8Encodable(fields: EncodableField[], format: MessageFormat): void {
  for (const field of fields) {
    const match = LONE_SURROGATE.exec(field.value);
    if (match) {
      throw new SerializationError(
        `field "${field.name}" contains unpaired surrogate ${describeCodeUnit(field.value, match.index)} at index ${match.index}`,
        format
      );
    }
  }
}

/**
 * Rejects values holding characters an XML 1.0 document cannot carry, escaped or not.
 */
export function assertXmlCharacters(fields: EncodableField[]): void {
  for (const field of fields) {
    const match = XML_FORBIDDEN_CHAR.exec(field.value);
    if (match) {
      throw new SerializationError(
        `field "${field.name}" contains character ${describeCodeUnit(field.value, match.index)} at index ${match.index}, which XML 1.0 does not allow`,
        'XML'
      );
    }
  }
}
