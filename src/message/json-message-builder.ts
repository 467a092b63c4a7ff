import { SerializationError, handleUnknownError } from '../errors/index';
import { assertUtf8Encodable } from './encoding';
import { Message, type MessageFormat } from './message';
import type { MessageBuilder } from './message-builder';

// Wire shape; the text travels under "message"
export interface JsonMessagePayload {
  recipient: string;
  message: string;
}

export class JsonMessageBuilder implements MessageBuilder {
  readonly format: MessageFormat = 'JSON';
  private recipient = '';
  private text = '';

  setRecipient(recipient: string): void {
    this.recipient = recipient;
  }

  setText(text: string): void {
    this.text = text;
  }

  finalize(): Message {
    assertUtf8Encodable(
      [
        { name: 'recipient', value: this.recipient },
        { name: 'message', value: this.text },
      ],
      this.format
    );

    const payload: JsonMessagePayload = {
      recipient: this.recipient,
      message: this.text,
    };

    let json: string;
    try {
      json = JSON.stringify(payload);
    } catch (e: unknown) {
      const err = handleUnknownError(e, 'Encoding JSON message');
      throw new SerializationError(err.message, this.format, e);
    }
    return new Message(Buffer.from(json, 'utf-8'), this.format);
  }
}
