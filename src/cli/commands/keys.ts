/**
 * `hydrate keys`: show how keys normalize.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { normalizeKey } from '../../core/keys/normalizer.js';

export function createKeysCommand(): Command {
  return new Command('keys')
    .description('Show the normalized attribute name of each key')
    .argument('<keys...>', 'Keys to normalize')
    .option('--json', 'Output as JSON')
    .action((keys: string[], options: KeysOptions) => {
      runKeys(keys, options);
    });
}

interface KeysOptions {
  json?: boolean;
}

function runKeys(keys: string[], options: KeysOptions): void {
  if (options.json) {
    const table = Object.fromEntries(keys.map((key) => [key, normalizeKey(key)]));
    console.log(JSON.stringify(table, null, 2));
    return;
  }

  for (const key of keys) {
    console.log(`${key} ${chalk.dim('→')} ${chalk.cyan(normalizeKey(key))}`);
  }
}
