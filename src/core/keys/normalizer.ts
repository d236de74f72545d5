/**
 * Key normalization: any source key to lower_snake_case.
 */

/** Anything that is not a letter, mark or number separates words. */
const SEPARATORS = /[^\p{L}\p{M}\p{N}]+/gu;
/** A run of capitals followed by a capitalized word: `HTTPServer`. */
const ACRONYM_BOUNDARY = /(\p{Lu}+)(\p{Lu}\p{Ll})/gu;
/** Lowercase or digit followed by a capital: `firstName`, `v2Api`. */
const CAMEL_BOUNDARY = /([\p{Ll}\p{N}])(\p{Lu})/gu;
const LETTER_DIGIT_BOUNDARY = /(\p{L})(\p{N})/gu;
const DIGIT_LETTER_BOUNDARY = /(\p{N})(\p{L})/gu;
const UNDERSCORE_RUNS = /_+/g;
const EDGE_UNDERSCORES = /^_|_$/g;

/**
 * Normalize a key to lowercase words joined by single underscores.
 *
 * Total and idempotent: `normalizeKey(normalizeKey(k)) === normalizeKey(k)`.
 *
 * @example
 * normalizeKey('firstName')  // 'first_name'
 * normalizeKey('user-info')  // 'user_info'
 * normalizeKey('HTTPServer') // 'http_server'
 * normalizeKey('Level3')     // 'level_3'
 */
export function normalizeKey(key: string): string {
  return key
    .replace(SEPARATORS, '_')
    .replace(ACRONYM_BOUNDARY, '$1_$2')
    .replace(CAMEL_BOUNDARY, '$1_$2')
    .replace(LETTER_DIGIT_BOUNDARY, '$1_$2')
    .replace(DIGIT_LETTER_BOUNDARY, '$1_$2')
    .toLowerCase()
    .replace(UNDERSCORE_RUNS, '_')
    .replace(EDGE_UNDERSCORES, '');
}

/**
 * Build the normalized → original key table for a mapping.
 * When two keys normalize to the same form, the later one wins.
 */
export function buildKeyTable(keys: Iterable<string>): Map<string, string> {
  const table = new Map<string, string>();
  for (const key of keys) {
    table.set(normalizeKey(key), key);
  }
  return table;
}
