import { z } from 'zod';
import { ENV_SCHEMA, type EnvConfig } from '../schemas/env-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid environment variables: ${formatEnvValidationError(e)}`);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ValidationError(`Environment validation failed: ${err.message}`);
  }
}

function formatEnvValidationError(zodError: z.ZodError): string {
  const fieldErrors = zodError.issues.map((issue) => {
    const field = issue.path.join('.');
    if (field === 'MESSAGE_DIRECTOR_FORMAT') {
      return `${field} must be one of 'json', 'xml' or 'all'`;
    }
    if (field === 'MESSAGE_DIRECTOR_COLOR') {
      return `${field} must be one of 'true', 'false', '1' or '0'`;
    }
    return `${field}: ${issue.message}`;
  });
  return fieldErrors.join(', ');
}
