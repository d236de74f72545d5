/**
 * CLI program.
 */
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createGetCommand } from './commands/get.js';
import { createKeysCommand } from './commands/keys.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('hydrate')
    .description('Attribute-style access to JSON, YAML and TOML data')
    .version(readVersion());
  [createGetCommand, createKeysCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
