/**
 * Options of the `accessors` transform as they appear in a run configuration.
 */
import { z } from 'zod';
import { RegistryError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';

const NameListSchema = z.array(z.string().min(1));

/**
 * `{ fields, entry_points }`, or a bare list of qualified field names.
 */
export const AccessorsOptionsSchema = z.preprocess(
  (value) => (Array.isArray(value) ? { fields: value } : value),
  z.object({
    fields: NameListSchema.min(1, 'at least one field is required'),
    entry_points: NameListSchema.min(1).optional(),
  })
);

export type AccessorsOptions = z.infer<typeof AccessorsOptionsSchema>;

export function parseAccessorsOptions(options: unknown): AccessorsOptions {
  const result = AccessorsOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new RegistryError(
      ErrorCodes.INVALID_TRANSFORM_OPTIONS,
      `Invalid options for transform 'accessors': ${formatZodError(result.error)}`,
      { transform: 'accessors', issues: result.error.issues }
    );
  }
  return result.data;
}
