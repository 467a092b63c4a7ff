import { XMLBuilder } from 'fast-xml-parser';
import { SerializationError, handleUnknownError } from '../errors/index';
import { assertUtf8Encodable, assertXmlCharacters, type EncodableField } from './encoding';
import { Message, type MessageFormat } from './message';
import type { MessageBuilder } from './message-builder';

export const XML_ROOT_ELEMENT = 'XMLMessage';

// Wire shape; the text travels in <body>
export interface XmlMessageRecord {
  recipient: string;
  body: string;
}

// Carriage returns go out as a character reference; parsers fold a raw CR into LF
export function escapeXmlText(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/\r/g, '&#xD;');
}

// Escaping is done by escapeXmlText; the codec's own pass would re-escape "&#xD;"
const XML_CODEC = new XMLBuilder({
  format: false,
  suppressEmptyNode: false,
  processEntities: false,
  tagValueProcessor: (_name: string, value: unknown) =>
    typeof value === 'string' ? escapeXmlText(value) : value,
});

export class XmlMessageBuilder implements MessageBuilder {
  readonly format: MessageFormat = 'XML';
  private recipient = '';
  private text = '';

  setRecipient(recipient: string): void {
    this.recipient = recipient;
  }

  setText(text: string): void {
    this.text = text;
  }

  finalize(): Message {
    const fields: EncodableField[] = [
      { name: 'recipient', value: this.recipient },
      { name: 'body', value: this.text },
    ];
    assertUtf8Encodable(fields, this.format);
    assertXmlCharacters(fields);

    const record: XmlMessageRecord = {
      recipient: this.recipient,
      body: this.text,
    };

    let xml: string;
    try {
      xml = String(XML_CODEC.build({ [XML_ROOT_ELEMENT]: record }));
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Encoding XML message');
      throw new SerializationError(err.message, this.format, e);
    }
    return new Message(Buffer.from(xml, 'utf-8'), this.format);
  }
}
