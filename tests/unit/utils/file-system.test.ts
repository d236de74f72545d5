/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { readFile, fileExists } from '../../../src/utils/file-system.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hydrate-fs-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('readFile', () => {
    it('should read file contents as utf-8', async () => {
      const file = path.join(tempDir, 'data.yaml');
      await fs.writeFile(file, 'name: café\n');

      expect(await readFile(file)).toBe('name: café\n');
    });

    it('should reject for a missing file', async () => {
      await expect(readFile(path.join(tempDir, 'missing.json'))).rejects.toThrow();
    });
  });

  describe('fileExists', () => {
    it('should return true for existing file', async () => {
      const file = path.join(tempDir, 'data.json');
      await fs.writeFile(file, '{}');

      expect(await fileExists(file)).toBe(true);
    });

    it('should return false for missing file', async () => {
      expect(await fileExists(path.join(tempDir, 'missing.json'))).toBe(false);
    });
  });
});
