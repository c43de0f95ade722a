import chalk from 'chalk';
import type { Command } from 'commander';
import { basename } from 'path';
import { expandDestination, matchRule } from '../../core/pattern-matcher.js';
import type { AutoprintConfig, PrintMode } from '../../types.js';
import { loadConfigOrExit } from '../shared.js';

export interface CheckResult {
  filename: string;
  pattern: string;
  destination: string;
  printMode: PrintMode;
  printer?: string;
}

/**
 * Dry run of the matcher for one filename: which rule wins and where the
 * file would go.
 */
export function checkFilename(config: AutoprintConfig, filename: string): CheckResult | null {
  const name = basename(filename);
  const match = matchRule(name, config.rules);
  if (!match) {
    return null;
  }
  const printer =
    match.rule.printMode === 'never' ? undefined : (match.rule.printer ?? config.defaultPrinter);
  return {
    filename: name,
    pattern: match.rule.pattern,
    destination: expandDestination(match.rule.destination, match.groups),
    printMode: match.rule.printMode,
    ...(printer ? { printer } : {}),
  };
}

export const registerCheckCommand = (program: Command): void => {
  program
    .command('check <filename>')
    .description('Show which pattern matches a filename and where it would be archived')
    .option('-c, --config <path>', 'Path to config file')
    .option('--json', 'Output as JSON')
    .action((filename: string, options: { config?: string; json?: boolean }) => {
      const { config } = loadConfigOrExit(options.config);
      const result = checkFilename(config, filename);

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }
      if (!result) {
        console.log(chalk.yellow(`No pattern matches ${basename(filename)}`));
        return;
      }
      console.log(`${chalk.cyan('Pattern:')}     ${result.pattern}`);
      console.log(`${chalk.cyan('Destination:')} ${result.destination}`);
      console.log(`${chalk.cyan('Print:')}       ${result.printMode}`);
      if (result.printer) {
        console.log(`${chalk.cyan('Printer:')}     ${result.printer}`);
      }
    });
};
