import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { SchemaValidationError } from '../errors/index.js';
import { logger } from '../utils/logging.js';

/**
 * Validate input against a Zod schema
 *
 * @returns The parsed (and defaulted) value
 * @throws SchemaValidationError listing every failing field
 *
 * @example
 * const input = validateInput(createSourceSchema, body, 'Source');
 */
export function validateInput<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  data: unknown,
  entityType: string
): Output {
  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof ZodError) {
      const formattedErrors = error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));

      logger.warn('Input validation failed', {
        service: 'validation',
        entityType,
        errors: formattedErrors,
      });

      throw new SchemaValidationError(formattedErrors, `Invalid ${entityType}: ${formattedErrors.length} error(s)`, {
        entityType,
      });
    }
    throw error;
  }
}
