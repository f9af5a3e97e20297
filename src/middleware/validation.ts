import { z, ZodError, ZodType, ZodTypeDef } from 'zod';
import { ValidationError, type ValidationIssue } from '../errors/index.js';

/**
 * Validation Middleware
 *
 * Request payload parsing with Zod schemas.
 */

function formatIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Parse a request payload, throwing a ValidationError the error handler
 * renders as 400 with per-field details.
 *
 * @example
 * ```typescript
 * const input = parseInput(createListSchema, req.body);
 * const list = await this.listService.createList(user, input);
 * ```
 */
export function parseInput<Output, Input = Output>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  data: unknown
): Output {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const details = formatIssues(result.error);
  const [first] = details;
  const message = first ? `${first.field || 'input'}: ${first.message}` : 'Validation failed';
  throw new ValidationError(message, { operation: 'parseInput' }, result.error, details);
}

/**
 * Common validation schemas
 * Reusable schemas for common patterns
 */
export const commonSchemas = {
  /**
   * Numeric route id (e.g. /lists/:id)
   */
  id: z.coerce.number().int().positive(),

  idParams: z.object({
    id: z.coerce.number().int().positive(),
  }),

  /**
   * Trimmed non-empty string
   */
  nonEmptyString: z.string().trim().min(1),

  /**
   * Optional boolean from query strings ('true' / '1')
   */
  queryBoolean: z
    .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
    .transform(value => value === true || value === 'true' || value === '1'),
};
