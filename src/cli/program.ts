import chalk from 'chalk';
import { Command } from 'commander';
import { PACKAGE_INFO } from '../version.js';
import { registerCliCommands } from './commands/index.js';

export const createProgram = (): Command => {
  const program = new Command();
  program
    .name('autoprint')
    .description(`🖨  ${chalk.cyan('autoprint - archive and print downloaded files by name')}`)
    .version(PACKAGE_INFO.version, '-v, --version', 'output the version number');

  registerCliCommands(program);
  return program;
};
