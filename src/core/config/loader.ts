/**
 * Option resolution: validation and defaults.
 */
import { z } from 'zod';
import { HydrateOptionsSchema, type HydrateConfigInput, type ResolvedOptions } from './schema.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import type { DiagnosticsSink, TraceSink } from '../nodes/types.js';

/**
 * Everything a caller can pass when hydrating.
 */
export type HydrateOptions = HydrateConfigInput & {
  /** Where warnings go (default: a LoggerSink) */
  diagnostics?: DiagnosticsSink;
  /** Where debug trace records go (default: the `hydrate:trace` logger) */
  onTrace?: TraceSink;
};

/**
 * Default option values.
 */
export function getDefaultOptions(): ResolvedOptions {
  return HydrateOptionsSchema.parse({});
}

/**
 * Validate options and apply defaults.
 */
export function resolveOptions(input: HydrateConfigInput = {}): ResolvedOptions {
  const result = HydrateOptionsSchema.safeParse(input);

  if (!result.success) {
    throw new SystemError(
      ErrorCodes.INVALID_OPTIONS,
      `Invalid hydrate options: ${formatZodError(result.error)}`,
      { issues: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Format Zod errors into a readable string.
 */
function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.map(String).join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
