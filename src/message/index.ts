export { Message, type MessageFormat } from './message';
export type { MessageBuilder } from './message-builder';
export { JsonMessageBuilder, type JsonMessagePayload } from './json-message-builder';
export { XmlMessageBuilder, XML_ROOT_ELEMENT, type XmlMessageRecord } from './xml-message-builder';
export { Sender, LETTER_RECIPIENT, LETTER_TEXT } from './sender';
export { createMessageBuilder, MessageFormatOption, MESSAGE_FORMATS } from './builder-factory';
export { decodeMessage, type LetterContent } from '../boundaries/message-decoder';
