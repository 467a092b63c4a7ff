import { z } from 'zod';
import { CLI_OPTIONS_SCHEMA, type CliOptions } from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

export function parseCliOptions(raw: unknown): CliOptions {
  try {
    return CLI_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid CLI options: ${formatCliValidationError(e)}`);
    }
    const err = handleUnknownError(e, 'CLI option parsing');
    throw new ValidationError(`CLI option parsing failed: ${err.message}`);
  }
}

function formatCliValidationError(zodError: z.ZodError): string {
  const fieldErrors = zodError.issues.map((issue) => {
    const field = issue.path.join('.');
    if (field === 'format') {
      return `--format must be one of 'json', 'xml' or 'all'`;
    }
    if (field === 'output') {
      return `--output must be one of 'line' or 'raw'`;
    }
    return `${field}: ${issue.message}`;
  });
  return fieldErrors.join(', ');
}
