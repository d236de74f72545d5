/**
 * File loading. The extension names the format; unknown extensions fall
 * back to text detection.
 */
import * as path from 'node:path';
import { fileExists, readFile } from '../../utils/file-system.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { parseToml } from '../../utils/toml.js';
import { parseYaml } from '../../utils/yaml.js';
import { detectText, type DetectedSource, type SourceFormat } from './detect.js';

const EXTENSION_FORMATS: Record<string, SourceFormat> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.toml': 'toml',
};

export function formatForPath(filePath: string): SourceFormat | undefined {
  return EXTENSION_FORMATS[path.extname(filePath).toLowerCase()];
}

/**
 * Load and parse a file.
 */
export async function loadSource(filePath: string): Promise<DetectedSource> {
  if (!(await fileExists(filePath))) {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `File not found: ${filePath}`, { filePath });
  }

  const content = await readFile(filePath);
  const format = formatForPath(filePath);

  try {
    switch (format) {
      case 'json':
        return { format, value: parseJson(content), attempts: [] };
      case 'yaml':
        return { format, value: parseYaml(content), attempts: [] };
      case 'toml':
        return { format, value: parseToml(content), attempts: [] };
      default:
        return detectText(content);
    }
  } catch (error) {
    if (error instanceof SystemError) {
      // Re-throw with file path context
      throw new SystemError(error.code, `${error.message} (file: ${filePath})`, {
        ...error.details,
        filePath,
      });
    }
    throw error;
  }
}

function parseJson(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { format: 'json' }
    );
  }
}
