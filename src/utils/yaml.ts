/**
 * YAML parsing utilities for run configurations.
 */
import { parseAllDocuments } from 'yaml';
import type { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';

/**
 * Parse multi-document YAML content into an array of plain values.
 * Documents are separated by '---'. Empty documents come back as null.
 */
export function parseYamlMultiDoc(content: string): unknown[] {
  const docs = parseAllDocuments(content);
  for (const doc of docs) {
    if (doc.errors.length > 0) {
      throw new SystemError(
        ErrorCodes.PARSE_ERROR,
        `Failed to parse YAML: ${doc.errors[0].message}`,
        { errors: doc.errors.map((e) => e.message) }
      );
    }
  }
  return docs.map((doc): unknown => doc.toJS());
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.map(String).join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
