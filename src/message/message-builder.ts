import type { Message, MessageFormat } from './message';

/**
 * Accumulates a recipient and a text and turns them into a `Message`.
 *
 * Implementations hold mutable state and do no locking: an instance belongs
 * to one construction sequence at a time. Do not hand the same builder to
 * two directors running concurrently.
 */
export interface MessageBuilder {
  readonly format: MessageFormat;

  /** Stores the recipient, replacing any earlier value. */
  setRecipient(recipient: string): void;

  /** Stores the message text, replacing any earlier value. */
  setText(text: string): void;

  /**
   * Encodes the stored fields. Fields never set encode as empty strings.
   * May be called more than once; the builder keeps its state.
   *
   * @throws {SerializationError} when the codec rejects the stored values
   */
  finalize(): Message;
}
