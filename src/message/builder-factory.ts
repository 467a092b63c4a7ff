import { JsonMessageBuilder } from './json-message-builder';
import type { MessageBuilder } from './message-builder';
import { XmlMessageBuilder } from './xml-message-builder';

export enum MessageFormatOption {
  Json = 'json',
  Xml = 'xml',
}

// Order in which the CLI builds messages when asked for every format
export const MESSAGE_FORMATS: readonly MessageFormatOption[] = [
  MessageFormatOption.Json,
  MessageFormatOption.Xml,
];

/**
 * Creates a fresh builder for the requested format. Builders are never
 * shared between calls.
 */
export function createMessageBuilder(format: MessageFormatOption): MessageBuilder {
  switch (format) {
    case MessageFormatOption.Json:
      return new JsonMessageBuilder();
    case MessageFormatOption.Xml:
      return new XmlMessageBuilder();
  }
}
