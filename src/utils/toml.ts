/**
 * TOML parsing and serialization utilities.
 */
import { parse, stringify } from 'smol-toml';
import { SystemError, ErrorCodes } from './errors.js';

/**
 * Parse TOML content. Date and time values come back as their ISO text so
 * the result only holds plain data.
 */
export function parseToml(content: string): Record<string, unknown> {
  try {
    return plainDates(parse(content));
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse TOML: ${error instanceof Error ? error.message : 'Unknown error'}`,
      { format: 'toml' }
    );
  }
}

/**
 * Stringify a table to TOML, without the trailing newline.
 */
export function stringifyToml(table: Record<string, unknown>): string {
  return stringify(table).trimEnd();
}

function plainDates(table: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(table)) {
    result[key] = plainDateValue(value);
  }
  return result;
}

function plainDateValue(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(plainDateValue);
  }
  if (typeof value === 'object' && value !== null) {
    return plainDates(value);
  }
  return value;
}
