import * as path from 'node:path';
import { RunSectionSchema, type RunSection } from './schema.js';
import { fileExists, readFile } from '../../utils/file-system.js';
import { formatZodError, parseYamlMultiDoc } from '../../utils/yaml.js';
import { ConfigError, SystemError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.accessorize/config.yaml';

/**
 * Parse run configuration text into its sections.
 * Empty documents are skipped and do not count towards section numbers.
 * @param origin Where the text came from, for error messages
 */
export function parseRunConfig(content: string, origin = '<config>'): RunSection[] {
  let documents: unknown[];
  try {
    documents = parseYamlMultiDoc(content);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new ConfigError(ErrorCodes.INVALID_CONFIG, `${error.message} (in ${origin})`, {
        ...error.details,
        origin,
      });
    }
    throw error;
  }

  const sections: RunSection[] = [];
  for (const document of documents) {
    if (document === null || document === undefined) continue;
    // Numbered as the driver numbers them.
    const number = sections.length + 1;
    const result = RunSectionSchema.safeParse(document);
    if (!result.success) {
      throw new ConfigError(
        ErrorCodes.INVALID_CONFIG,
        `Invalid run section ${number} in ${origin}: ${formatZodError(result.error)}`,
        { origin, section: number, issues: result.error.issues }
      );
    }
    sections.push(result.data);
  }
  return sections;
}

/**
 * Load the run configuration of a project.
 */
export async function loadRunConfig(
  projectRoot: string,
  configPath: string = DEFAULT_CONFIG_PATH
): Promise<RunSection[]> {
  const fullPath = path.resolve(projectRoot, configPath);

  if (!(await fileExists(fullPath))) {
    throw new ConfigError(ErrorCodes.CONFIG_NOT_FOUND, `Run configuration not found: ${fullPath}`, {
      path: fullPath,
    });
  }

  return parseRunConfig(await readFile(fullPath), fullPath);
}

