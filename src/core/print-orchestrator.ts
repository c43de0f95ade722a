import { basename } from 'path';
import { PrintSubmitError, PrinterSwitchError, describeError } from '../errors.js';
import type { IPrintConfirmer, IPrintSpooler } from '../interfaces.js';
import type { Logger } from '../logger.js';
import type { Rule } from '../types.js';
import type { Sleep } from '../utils/timing.js';
import type { PollOutcome, PrintJobPoller } from './print-job-poller.js';
import type { Reporter } from './reporter.js';

export type PrintOutcome =
  | { status: 'not-requested' }
  | { status: 'declined' }
  | { status: 'no-printer' }
  | { status: 'printed'; printer: string; poll: PollOutcome }
  | { status: 'submit-failed'; printer: string; error: PrintSubmitError };

export interface PrintOrchestratorOptions {
  spooler: IPrintSpooler;
  confirmer: IPrintConfirmer;
  poller: PrintJobPoller;
  reporter: Reporter;
  logger: Logger;
  defaultPrinter?: string;
  settleMs: number;
  sleep: Sleep;
}

/**
 * Prints an archived file according to its rule.
 *
 * When the target printer is not the OS default, the default is switched for
 * the duration of the submission and put back afterwards on every path,
 * including submission failures and poll timeouts.
 */
export class PrintOrchestrator {
  private readonly spooler: IPrintSpooler;
  private readonly confirmer: IPrintConfirmer;
  private readonly poller: PrintJobPoller;
  private readonly reporter: Reporter;
  private readonly logger: Logger;
  private readonly defaultPrinter?: string;
  private readonly settleMs: number;
  private readonly sleep: Sleep;

  constructor(options: PrintOrchestratorOptions) {
    this.spooler = options.spooler;
    this.confirmer = options.confirmer;
    this.poller = options.poller;
    this.reporter = options.reporter;
    this.logger = options.logger;
    this.defaultPrinter = options.defaultPrinter;
    this.settleMs = options.settleMs;
    this.sleep = options.sleep;
  }

  public async handle(archivedPath: string, rule: Rule): Promise<PrintOutcome> {
    if (rule.printMode === 'never') {
      return { status: 'not-requested' };
    }

    if (rule.printMode === 'prompt' && !(await this.confirm(archivedPath))) {
      this.logger.info(`Printing declined for ${basename(archivedPath)}`);
      await this.reporter.archivedWithoutPrinting(archivedPath);
      return { status: 'declined' };
    }

    const printer = rule.printer ?? this.defaultPrinter;
    if (!printer) {
      this.logger.warn(`No printer configured, not printing ${basename(archivedPath)}`);
      return { status: 'no-printer' };
    }

    const originalDefault = await this.switchDefaultPrinter(printer);
    try {
      this.logger.info(`Printing ${basename(archivedPath)} to ${printer}`);
      try {
        await this.spooler.submitPrint(archivedPath);
      } catch (cause) {
        const error = new PrintSubmitError(archivedPath, printer, cause);
        this.logger.error(error.message);
        await this.reporter.printFailed(archivedPath, error);
        return { status: 'submit-failed', printer, error };
      }

      await this.reporter.printStarted(archivedPath, printer);
      await this.sleep(this.settleMs);
      const poll = await this.poller.waitForCompletion(archivedPath);
      return { status: 'printed', printer, poll };
    } finally {
      if (originalDefault !== undefined) {
        await this.restoreDefaultPrinter(originalDefault);
      }
    }
  }

  private async confirm(archivedPath: string): Promise<boolean> {
    try {
      return await this.confirmer.confirm(basename(archivedPath));
    } catch (error) {
      this.logger.warn(`Print confirmation failed, not printing: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * Returns the previous default when it was changed, so the caller can
   * restore it. The default is only switched when the current one is known;
   * otherwise, or when the switch fails, printing goes ahead on whatever
   * default is active.
   */
  private async switchDefaultPrinter(printer: string): Promise<string | undefined> {
    let current: string | undefined;
    try {
      current = await this.spooler.getDefaultPrinter();
    } catch (cause) {
      this.logger.error(new PrinterSwitchError(printer, cause).message);
      return undefined;
    }

    if (current === undefined) {
      this.logger.error(
        new PrinterSwitchError(printer, new Error('no current default printer to restore')).message
      );
      return undefined;
    }
    if (current.toLowerCase() === printer.toLowerCase()) {
      return undefined;
    }

    try {
      await this.spooler.setDefaultPrinter(printer);
      this.logger.debug(`Default printer switched from ${current} to ${printer}`);
      return current;
    } catch (cause) {
      this.logger.error(new PrinterSwitchError(printer, cause).message);
      return undefined;
    }
  }

  private async restoreDefaultPrinter(original: string): Promise<void> {
    try {
      await this.spooler.setDefaultPrinter(original);
      this.logger.debug(`Default printer restored to ${original}`);
    } catch (cause) {
      this.logger.error(new PrinterSwitchError(original, cause).message);
    }
  }
}
