/**
 * Tests for the keys command.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createKeysCommand } from '../../../../src/cli/commands/keys.js';

// Mock chalk with pass-through
vi.mock('chalk', () => ({
  default: {
    cyan: (s: string) => s,
    dim: (s: string) => s,
  },
}));

describe('keys command', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  it('should create a command with correct name', () => {
    const command = createKeysCommand();

    expect(command.name()).toBe('keys');
    expect(command.options.map((opt) => opt.long)).toEqual(['--json']);
  });

  it('should print one line per key', async () => {
    await createKeysCommand().parseAsync(['node', 'test', 'firstName', 'user-info', 'HTTPServer']);

    expect(consoleLogSpy.mock.calls).toEqual([
      ['firstName → first_name'],
      ['user-info → user_info'],
      ['HTTPServer → http_server'],
    ]);
  });

  it('should print a JSON table with --json', async () => {
    await createKeysCommand().parseAsync(['node', 'test', 'Level3', '--json']);

    expect(consoleLogSpy).toHaveBeenCalledWith(JSON.stringify({ Level3: 'level_3' }, null, 2));
  });
});
