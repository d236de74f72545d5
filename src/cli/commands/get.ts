/**
 * `hydrate get`: print a representation of a path inside a data file.
 */
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { Hydrate } from '../../core/root/hydrate.js';
import { WarningCollector } from '../../core/diagnostics/sinks.js';
import { SELECTORS } from '../../core/nodes/types.js';
import type { StructuralValue } from '../../core/nodes/types.js';
import { logger as log } from '../../utils/logger.js';

/**
 * Create the get command.
 */
export function createGetCommand(): Command {
  return new Command('get')
    .description('Print the value at a path of a JSON, YAML or TOML file')
    .argument('<file>', 'File to load (.json, .yaml, .yml, .toml or any text)')
    .argument('[path]', 'Path to walk, e.g. users[0].name', '')
    .option('-f, --format <selector>', `Output selector (${SELECTORS.join(', ')})`, 'yaml')
    .option('--json-indent <n>', 'Indentation of json output', parseInteger)
    .option('--debug', 'Print a trace of every access')
    .option('--strict', 'Fail on the first recorded warning')
    .action(async (file: string, pathExpression: string, options: GetOptions) => {
      try {
        await runGet(file, pathExpression, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

interface GetOptions {
  format: string;
  jsonIndent?: number;
  debug?: boolean;
  strict?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

async function runGet(file: string, pathExpression: string, options: GetOptions): Promise<void> {
  const collector = new WarningCollector();
  const root = await Hydrate.fromFile(file, {
    debug: options.debug ?? false,
    strict: options.strict ?? false,
    jsonIndent: options.jsonIndent,
    diagnostics: collector,
  });

  const output = root.query(pathExpression).resolve(options.format);
  console.log(formatOutput(output));

  for (const warning of collector.warnings) {
    console.error(chalk.yellow(`⚠ ${warning.name} ${warning.code}: ${warning.message}`));
  }
}

function formatOutput(output: StructuralValue): string {
  return typeof output === 'string' ? output : JSON.stringify(output, null, 2);
}
