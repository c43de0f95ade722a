#!/usr/bin/env node
import chalk from 'chalk';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { createProgram } from './cli/program.js';
import { describeError } from './errors.js';

export { createProgram };

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isMainModule()) {
  const program = createProgram();
  if (!process.argv.slice(2).length) {
    program.outputHelp();
  } else {
    program.parseAsync(process.argv).catch((error: unknown) => {
      console.error(chalk.red(describeError(error)));
      process.exit(1);
    });
  }
}
