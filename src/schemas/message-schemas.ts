import { z } from 'zod';

// Decoded JSON body
export const JSON_MESSAGE_SCHEMA = z.object({
  recipient: z.string(),
  message: z.string(),
}).strict();

// Decoded XML document; the root element wraps the two child elements
export const XML_MESSAGE_SCHEMA = z.object({
  XMLMessage: z.object({
    recipient: z.string(),
    body: z.string(),
  }).strict(),
}).strict();

export type JsonMessageBody = z.infer<typeof JSON_MESSAGE_SCHEMA>;
export type XmlMessageDocument = z.infer<typeof XML_MESSAGE_SCHEMA>;
