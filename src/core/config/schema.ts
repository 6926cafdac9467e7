/**
 * Run configuration schema. A configuration file holds one or more YAML
 * documents; each document is a run section.
 */
import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/**
 * Section keys are matched case-insensitively, so `Files:` and
 * `Transforms:` read the same as their lowercase forms.
 */
function lowercaseKeys(value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key.toLowerCase(), entry]));
}

/** Default glob for compilation-unit documents when a section names no files. */
export const DEFAULT_UNIT_GLOB = '**/*.ast.json';

/** Where patched text goes. */
export const OutputModeSchema = z.enum(['in-place', 'out-dir', 'stdout']);

export const OutputSchema = z
  .preprocess(
    lowercaseKeys,
    z.object({
      mode: OutputModeSchema.default('in-place'),
      /** Target directory for out-dir, relative to the project root */
      dir: z.string().min(1).optional(),
    })
  )
  .refine((output) => output.mode !== 'out-dir' || output.dir !== undefined, {
    message: "output.dir is required when mode is 'out-dir'",
    path: ['dir'],
  });

export const RunSectionSchema = z.preprocess(
  lowercaseKeys,
  z.object({
    /** Compilation-unit documents, relative to the project root. Globs allowed. */
    files: z.array(z.string().min(1)).optional(),
    /** Transform name -> transform options */
    transforms: z.record(z.string(), z.unknown()).optional(),
    output: withDefaults(OutputSchema),
  })
);

export type OutputMode = z.infer<typeof OutputModeSchema>;
export type OutputConfig = z.infer<typeof OutputSchema>;
export type RunSection = z.infer<typeof RunSectionSchema>;
