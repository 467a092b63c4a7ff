import type { Message, MessageFormat } from "../message/message";
import type { MessageBuilder } from "../message/message-builder";
import { debug } from "../output/logger";

/*
 * Wraps a builder and reports each construction step at debug level.
 * Everything is forwarded unchanged, errors included.
 */
export class TracingMessageBuilder implements MessageBuilder {
  constructor(private readonly inner: MessageBuilder) {}

  get format(): MessageFormat {
    return this.inner.format;
  }

  setRecipient(recipient: string): void {
    debug(`${this.format}: recipient set (${recipient.length} char(s))`);
    this.inner.setRecipient(recipient);
  }

  setText(text: string): void {
    debug(`${this.format}: text set (${text.length} char(s))`);
    this.inner.setText(text);
  }

  finalize(): Message {
    const message = this.inner.finalize();
    debug(`${this.format}: finalized into ${message.byteLength} byte(s)`);
    return message;
  }
}
