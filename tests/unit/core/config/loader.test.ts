/**
 * Tests for option resolution.
 */
import { describe, it, expect } from 'vitest';
import { getDefaultOptions, resolveOptions } from '../../../../src/core/config/loader.js';
import { HydrateOptionsSchema } from '../../../../src/core/config/schema.js';
import { ErrorCodes, SystemError } from '../../../../src/utils/errors.js';

describe('getDefaultOptions', () => {
  it('returns the documented defaults', () => {
    expect(getDefaultOptions()).toEqual({
      debug: false,
      strict: false,
      jsonIndent: 3,
      yamlIndent: 2,
      yamlLineWidth: 100,
      tomlRootKey: 'root',
    });
  });
});

describe('resolveOptions', () => {
  it('merges given values over defaults', () => {
    const options = resolveOptions({ debug: true, jsonIndent: 2 });

    expect(options.debug).toBe(true);
    expect(options.jsonIndent).toBe(2);
    expect(options.yamlIndent).toBe(2);
  });

  it('drops keys the schema does not know', () => {
    const input = { debug: true, extra: 'ignored' };
    const options = resolveOptions(input);

    expect(options).not.toHaveProperty('extra');
  });

  it('throws INVALID_OPTIONS with the offending path', () => {
    try {
      resolveOptions({ jsonIndent: 11, tomlRootKey: '' });
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      expect(error).toMatchObject({ code: ErrorCodes.INVALID_OPTIONS });
      expect(error instanceof Error ? error.message : '').toMatch(/^Invalid hydrate options: jsonIndent: .+; tomlRootKey: .+$/);
    }
  });

  it('rejects non-integer indents', () => {
    expect(() => resolveOptions({ yamlIndent: 1.5 })).toThrow(SystemError);
  });
});

describe('HydrateOptionsSchema', () => {
  it('accepts an empty object', () => {
    expect(HydrateOptionsSchema.safeParse({}).success).toBe(true);
  });
});
