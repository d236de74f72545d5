/**
 * Tests for the Hydrate root.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Hydrate, createContext, hydrate, hydrateFile } from '../../../../src/core/root/hydrate.js';
import { LoggerSink, StrictSink, WarningCollector } from '../../../../src/core/diagnostics/sinks.js';
import { AccessPatternError, APIUsageError, ErrorCodes, SystemError } from '../../../../src/utils/errors.js';
import type { TraceRecord } from '../../../../src/core/nodes/types.js';

const fixturesDir = fileURLToPath(new URL('../../../fixtures/data/', import.meta.url));

describe('createContext', () => {
  it('applies defaults', () => {
    const context = createContext();

    expect(context.debug).toBe(false);
    expect(context.options.jsonIndent).toBe(3);
    expect(context.diagnostics).toBeInstanceOf(LoggerSink);
  });

  it('wraps the sink in strict mode', () => {
    const collector = new WarningCollector();
    const context = createContext({ strict: true, diagnostics: collector });

    expect(context.diagnostics).toBeInstanceOf(StrictSink);
  });

  it('rejects invalid options', () => {
    expect(() => createContext({ jsonIndent: -1 })).toThrow(SystemError);
  });
});

describe('Hydrate', () => {
  let collector: WarningCollector;

  beforeEach(() => {
    collector = new WarningCollector();
  });

  it.each([
    ['{"a": 1}', 'mapping', 'json'],
    ['[1, 2]', 'sequence', 'json'],
    ['a = 1', 'mapping', 'toml'],
    ['- a\n- b', 'sequence', 'yaml'],
    ['"text"', 'terminal', 'json'],
    ['null', 'none', 'json'],
  ])('detects %j as a %s from %s', (source, shape, format) => {
    const root = new Hydrate(source, { diagnostics: collector });

    expect(root.shape).toBe(shape);
    expect(root.format).toBe(format);
    expect(root.depth).toBe(0);
  });

  it('accepts in-memory values', () => {
    const root = new Hydrate({ items: [1, 2] }, { diagnostics: collector });

    expect(root.format).toBe('native');
    expect(root.get('items').resolve()).toEqual([1, 2]);
    expect(root.call('type')).toBe('dict');
  });

  it('keeps unparseable text as a terminal', () => {
    const root = new Hydrate('key: [unclosed', { diagnostics: collector });

    expect(root.shape).toBe('terminal');
    expect(root.format).toBe('text');
    expect(root.call()).toBe('key: [unclosed');
  });

  it('indexes a top-level sequence', () => {
    const root = new Hydrate([{ name: 'Alice' }], { diagnostics: collector });

    expect(root.at(0).getAttribute('name').resolve()).toBe('Alice');
    expect(root.access('0').resolve('depth')).toBe(1);
  });

  it('walks path expressions', () => {
    const root = new Hydrate({ users: [{ firstName: 'Alice' }], 'a.b': { c: 1 } }, { diagnostics: collector });

    expect(root.query('users[0].first_name').resolve()).toBe('Alice');
    expect(root.query('users.0.first_name').resolve()).toBe('Alice');
    expect(root.query('a_b.c').resolve()).toBe(1);
    expect(root.query('').resolve('type')).toBe('dict');
    expect(root.query('users[5].first_name').resolve('depth')).toBe(3);
  });

  it('records a malformed path expression', () => {
    const root = new Hydrate({ a: 1 }, { diagnostics: collector });
    const node = root.query('a[');

    expect(node.resolve()).toBeNull();
    expect(node.depth).toBe(1);
    expect(collector.warnings[0]).toBeInstanceOf(APIUsageError);
    expect(collector.warnings[0].code).toBe(ErrorCodes.INVALID_PATH);
    expect(collector.warnings[0].message).toBe('Invalid path expression: a[');
  });

  it('throws recorded warnings in strict mode', () => {
    const root = new Hydrate({ list: [1] }, { strict: true, diagnostics: collector });

    expect(() => root.query('list[3]')).toThrow(AccessPatternError);
    expect(collector.warnings).toHaveLength(1);
    expect(root.query('list[0]').resolve()).toBe(1);
  });

  it('traces every access in debug mode', () => {
    const records: TraceRecord[] = [];
    const root = new Hydrate({ a: { b: 1 } }, { debug: true, diagnostics: collector, onTrace: (r) => records.push(r) });

    expect(root.debug).toBe(true);
    root.view().a.b();

    expect(records).toEqual([
      { nodeKind: 'mapping', operation: 'get', key: 'a', depth: 1 },
      { nodeKind: 'mapping', operation: 'get', key: 'b', depth: 2 },
      { nodeKind: 'terminal', operation: 'call', key: 'value', depth: 2, output: 1 },
    ]);
  });

  it('walks and resolves a recursive YAML alias', () => {
    const root = new Hydrate('a: &x\n  b: *x\n', { diagnostics: collector });

    expect(root.shape).toBe('mapping');
    expect(root.format).toBe('yaml');
    expect(root.query('a.b.b.b').resolve('depth')).toBe(4);
    expect(root.query('a').resolve()).toEqual({ b: null });
    expect(collector.warnings).toHaveLength(1);
    expect(collector.warnings[0].code).toBe(ErrorCodes.UNSUPPORTED_TYPE);
  });

  it('shares one context across the tree', () => {
    const root = new Hydrate({ a: { b: [1] } }, { diagnostics: collector });

    expect(root.query('a.b[0]').context).toBe(root.context);
  });

  it('loads files', async () => {
    const root = await Hydrate.fromFile(path.join(fixturesDir, 'users.yaml'), { diagnostics: collector });

    expect(root.format).toBe('yaml');
    expect(root.query('users[1].first_name').resolve()).toBe('Bob');
    expect(root.query('settings.backup_host').resolve('type')).toBe('NoneType');
  });

  it('does not detect the contents of a loaded file again', async () => {
    const root = await Hydrate.fromFile(path.join(fixturesDir, 'freeform.txt'), { diagnostics: collector });

    expect(root.format).toBe('text');
    expect(root.shape).toBe('terminal');
  });

  it('logs construction in debug mode without a trace sink', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    new Hydrate('[1]', { debug: true, diagnostics: collector });

    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('[hydrate] Root constructed'));
    logSpy.mockRestore();
  });
});

describe('hydrate', () => {
  it('returns the root view', () => {
    const data = hydrate('{"user-info": {"firstName": "John"}}');

    expect(data.user_info.first_name()).toBe('John');
  });
});

describe('hydrateFile', () => {
  it('returns the root view of a file', async () => {
    const data = await hydrateFile(path.join(fixturesDir, 'users.toml'), { diagnostics: new WarningCollector() });

    expect(data.users[0].age()).toBe(34);
    expect(data.team_name()).toBe('Platform');
  });

  it('rejects missing files', async () => {
    await expect(hydrateFile(path.join(fixturesDir, 'absent.yaml'))).rejects.toMatchObject({
      code: ErrorCodes.FILE_NOT_FOUND,
    });
  });
});
