import type { Message } from './message';
import type { MessageBuilder } from './message-builder';

export const LETTER_RECIPIENT = 'Santa Claus';
export const LETTER_TEXT =
  'I have tried to be good all year and hope that you and your reindeers will be able to deliver me a nice present.';

/*
 * Director for message builders. Always writes the same letter; the builder
 * it is given decides how that letter is encoded. Errors from finalize()
 * propagate to the caller untouched.
 */
export class Sender {
  buildMessage(builder: MessageBuilder): Message {
    builder.setRecipient(LETTER_RECIPIENT);
    builder.setText(LETTER_TEXT);
    return builder.finalize();
  }
}
