/**
 * Hydration option schema.
 */
import { z } from 'zod';

export const HydrateOptionsSchema = z.object({
  /** Emit a trace record for every traversal step and terminal call */
  debug: z.boolean().default(false),
  /** Throw recorded warnings instead of only recording them */
  strict: z.boolean().default(false),
  /** Indentation of the `json` selector output */
  jsonIndent: z.number().int().min(0).max(10).default(3),
  /** Indentation of the `yaml` selector output */
  yamlIndent: z.number().int().min(1).max(10).default(2),
  /** Preferred line width of the `yaml` selector output */
  yamlLineWidth: z.number().int().min(0).default(100),
  /** Table name a top-level sequence is wrapped under for the `toml` selector */
  tomlRootKey: z.string().min(1).default('root'),
});

/** Options after defaults have been applied. */
export type ResolvedOptions = z.infer<typeof HydrateOptionsSchema>;

/** Options as a caller writes them: every field optional. */
export type HydrateConfigInput = z.input<typeof HydrateOptionsSchema>;
