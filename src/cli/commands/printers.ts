import chalk from 'chalk';
import type { Command } from 'commander';
import { describeError } from '../../errors.js';
import type { IPrintSpooler } from '../../interfaces.js';
import { createPrintSpooler } from '../../spoolers/index.js';
import { exitWithError } from '../shared.js';

export interface PrinterListing {
  printers: string[];
  defaultPrinter?: string;
}

export async function listPrinters(spooler: IPrintSpooler): Promise<PrinterListing> {
  const [printers, defaultPrinter] = await Promise.all([
    spooler.enumeratePrinters(),
    spooler.getDefaultPrinter(),
  ]);
  return { printers, ...(defaultPrinter ? { defaultPrinter } : {}) };
}

export const registerPrintersCommand = (program: Command): void => {
  program
    .command('printers')
    .description('List printers and the current default')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      let listing: PrinterListing;
      try {
        listing = await listPrinters(createPrintSpooler());
      } catch (error) {
        return exitWithError(`Could not query printers: ${describeError(error)}`);
      }

      if (options.json) {
        console.log(JSON.stringify(listing, null, 2));
        return;
      }
      if (listing.printers.length === 0) {
        console.log(chalk.yellow('No printers found'));
        return;
      }
      for (const printer of listing.printers) {
        const isDefault = printer === listing.defaultPrinter;
        console.log(isDefault ? `${chalk.green('*')} ${printer} ${chalk.gray('(default)')}` : `  ${printer}`);
      }
    });
};
