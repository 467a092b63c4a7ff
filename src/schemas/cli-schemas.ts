import { z } from 'zod';

// Accepts any casing; "all" expands to every supported format
export const FORMAT_SELECTION_SCHEMA = z.preprocess(
  (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(['json', 'xml', 'all'])
);

// CLI options schema for command line argument validation
export const CLI_OPTIONS_SCHEMA = z.object({
  verbose: z.boolean().default(false),
  format: FORMAT_SELECTION_SCHEMA.optional(),
  output: z.enum(['line', 'raw']).default('line'),
});

// Inferred types
export type FormatSelection = z.infer<typeof FORMAT_SELECTION_SCHEMA>;
export type CliOptions = z.infer<typeof CLI_OPTIONS_SCHEMA>;
