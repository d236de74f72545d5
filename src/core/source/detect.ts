/**
 * Source detection: structured text is tried as JSON, then TOML, then YAML.
 * A failed attempt is an ordinary outcome; text no parser accepts stays text.
 */
import { parseToml } from '../../utils/toml.js';
import { parseYaml } from '../../utils/yaml.js';

export type SourceFormat = 'json' | 'toml' | 'yaml' | 'text' | 'native';

export type ParseAttempt =
  | { ok: true; format: SourceFormat; value: unknown }
  | { ok: false; format: SourceFormat; reason: string };

export interface DetectedSource {
  format: SourceFormat;
  value: unknown;
  /** Failed attempts, in the order they were tried */
  attempts: Array<Extract<ParseAttempt, { ok: false }>>;
}

type TextParser = (text: string) => unknown;

const TEXT_PARSERS: ReadonlyArray<[SourceFormat, TextParser]> = [
  ['json', (text) => JSON.parse(text)],
  ['toml', parseToml],
  ['yaml', parseYaml],
];

export function tryParse(format: SourceFormat, parser: TextParser, text: string): ParseAttempt {
  try {
    return { ok: true, format, value: parser(text) };
  } catch (error) {
    return { ok: false, format, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Parse `text` with the first parser that accepts it.
 */
export function detectText(text: string): DetectedSource {
  const attempts: DetectedSource['attempts'] = [];
  for (const [format, parser] of TEXT_PARSERS) {
    const attempt = tryParse(format, parser, text);
    if (attempt.ok) {
      return { format: attempt.format, value: attempt.value, attempts };
    }
    attempts.push(attempt);
  }
  return { format: 'text', value: text, attempts };
}

/**
 * Strings go through text detection; anything else is used as is.
 */
export function detectSource(source: unknown): DetectedSource {
  if (typeof source === 'string') {
    return detectText(source);
  }
  return { format: 'native', value: source, attempts: [] };
}
