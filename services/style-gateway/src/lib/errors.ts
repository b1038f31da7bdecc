import { ZodError } from 'zod';

/**
 * Style rules (or service settings) could not be loaded.
 * Fatal at startup: the matcher is never handed an unloadable rule set.
 */
export class ConfigurationError extends Error {
  readonly name = 'ConfigurationError';

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * An inbound context does not conform to the attribute enumerations.
 */
export class ValidationError extends Error {
  readonly name = 'ValidationError';

  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ValidationError);
    }
  }
}

/**
 * Flatten zod issues into "path: message" strings.
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.errors.map(e => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}
