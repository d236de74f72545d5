/**
 * Tests for TOML utility functions.
 */
import { describe, it, expect } from 'vitest';
import { parseToml, stringifyToml } from '../../../src/utils/toml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';

describe('parseToml', () => {
  it('should parse tables and arrays of tables', () => {
    const toml = `
title = "demo"

[owner]
name = "x"

[[items]]
id = 1

[[items]]
id = 2
`;
    expect(parseToml(toml)).toEqual({ title: 'demo', owner: { name: 'x' }, items: [{ id: 1 }, { id: 2 }] });
  });

  it('should turn dates into ISO text', () => {
    const result = parseToml('day = 2024-05-01\nstamps = [2024-05-01T12:00:00Z]\n[nested]\nat = 2024-05-01T12:00:00Z');

    expect(result).toEqual({
      day: expect.stringMatching(/^2024-05-01/),
      stamps: ['2024-05-01T12:00:00.000Z'],
      nested: { at: '2024-05-01T12:00:00.000Z' },
    });
  });

  it('should parse an empty document as an empty table', () => {
    expect(parseToml('')).toEqual({});
  });

  it('should throw SystemError on invalid TOML', () => {
    expect(() => parseToml('a = ')).toThrow(SystemError);
    expect(() => parseToml('a: 1')).toThrow(expect.objectContaining({ code: ErrorCodes.PARSE_ERROR }));
  });
});

describe('stringifyToml', () => {
  it('should stringify without a trailing newline', () => {
    expect(stringifyToml({ a: 1 })).toBe('a = 1');
  });

  it('should round trip nested tables', () => {
    const table = { name: 'x', server: { port: 8080, hosts: ['a', 'b'] } };

    expect(parseToml(stringifyToml(table))).toEqual(table);
  });
});
