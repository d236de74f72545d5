/**
 * YAML parsing and serialization utilities.
 */
import { parse, stringify } from 'yaml';
import { SystemError, ErrorCodes } from './errors.js';

export interface YamlStringifyOptions {
  indent?: number;
  lineWidth?: number;
}

/**
 * Parse YAML content.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { format: 'yaml' }
    );
  }
}

/**
 * Stringify a value to YAML, without the trailing newline.
 */
export function stringifyYaml(data: unknown, options: YamlStringifyOptions = {}): string {
  return stringify(data, {
    indent: options.indent ?? 2,
    lineWidth: options.lineWidth ?? 100,
  }).trimEnd();
}
