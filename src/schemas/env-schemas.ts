import { z } from 'zod';
import { FORMAT_SELECTION_SCHEMA } from './cli-schemas';

const BOOLEAN_FLAG_SCHEMA = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

// Environment configuration; unrelated variables are ignored
export const ENV_SCHEMA = z.object({
  MESSAGE_DIRECTOR_FORMAT: FORMAT_SELECTION_SCHEMA.default('all'),
  MESSAGE_DIRECTOR_COLOR: z.preprocess(
    (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    BOOLEAN_FLAG_SCHEMA
  ).optional(),
});

// Inferred types
export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
