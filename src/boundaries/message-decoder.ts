import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { DecodeError, handleUnknownError } from '../errors/index';
import type { Message } from '../message/message';
import { JSON_MESSAGE_SCHEMA, XML_MESSAGE_SCHEMA } from '../schemas/message-schemas';

// Logical content of a message, independent of its wire format
export interface LetterContent {
  recipient: string;
  text: string;
}

const XML_PARSER = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: false,
  processEntities: true,
  // Numeric references such as &#xD; are only decoded with the HTML entity set
  htmlEntities: true,
});

function formatIssues(e: z.ZodError): string {
  return e.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join(', ');
}

function decodeJson(message: Message): LetterContent {
  let raw: unknown;
  try {
    raw = JSON.parse(message.toString());
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Parsing JSON message');
    throw new DecodeError(err.message, message.format, e);
  }

  const result = JSON_MESSAGE_SCHEMA.safeParse(raw);
  if (!result.success) {
    throw new DecodeError(formatIssues(result.error), message.format, result.error);
  }
  return { recipient: result.data.recipient, text: result.data.message };
}

function decodeXml(message: Message): LetterContent {
  let raw: unknown;
  try {
    // Passing `true` runs the validator first, so malformed documents throw
    raw = XML_PARSER.parse(message.toString(), true);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Parsing XML message');
    throw new DecodeError(err.message, message.format, e);
  }

  const result = XML_MESSAGE_SCHEMA.safeParse(raw);
  if (!result.success) {
    throw new DecodeError(formatIssues(result.error), message.format, result.error);
  }
  return { recipient: result.data.XMLMessage.recipient, text: result.data.XMLMessage.body };
}

/**
 * Reads the recipient and text back out of a built message.
 *
 * @throws {DecodeError} if the body is malformed or has the wrong shape
 */
export function decodeMessage(message: Message): LetterContent {
  switch (message.format) {
    case 'JSON':
      return decodeJson(message);
    case 'XML':
      return decodeXml(message);
  }
}
