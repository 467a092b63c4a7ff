import type { MessageFormat } from '../message/message';

// Base error class for all message-director errors
export class MessageDirectorError extends Error {
  constructor(message: string, public readonly code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MessageDirectorError';
  }
}

// Raised when a builder cannot encode its state into the target format
export class SerializationError extends MessageDirectorError {
  constructor(
    message: string,
    public readonly format: MessageFormat,
    cause?: unknown
  ) {
    super(`${format} serialization failed: ${message}`, 'SERIALIZATION_ERROR', { cause });
    this.name = 'SerializationError';
  }
}

// Raised when a message body does not decode to a recipient/text pair
export class DecodeError extends MessageDirectorError {
  constructor(
    message: string,
    public readonly format: MessageFormat,
    cause?: unknown
  ) {
    super(`${format} decoding failed: ${message}`, 'DECODE_ERROR', { cause });
    this.name = 'DecodeError';
  }
}

// Validation error for CLI options and environment
export class ValidationError extends MessageDirectorError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
