export type MessageFormat = 'JSON' | 'XML';

/**
 * The product of a builder: an encoded body plus the tag of the format it
 * was encoded in. Instances are only created by `MessageBuilder.finalize`.
 *
 * The constructor takes ownership of `bytes`. `body` hands out a copy, so
 * writing into it never changes the message.
 */
export class Message {
  private readonly bytes: Buffer;

  constructor(
    bytes: Buffer,
    public readonly format: MessageFormat
  ) {
    this.bytes = bytes;
    Object.freeze(this);
  }

  get body(): Buffer {
    return Buffer.from(this.bytes);
  }

  get byteLength(): number {
    return this.bytes.length;
  }

  toString(): string {
    return this.bytes.toString('utf-8');
  }
}
