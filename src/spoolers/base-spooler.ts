import type { IPrintSpooler } from '../interfaces.js';
import type { PrintJob } from '../types.js';
import type { CommandRunner, RunOptions, RunResult } from '../utils/command-runner.js';

// Any single spooler command that takes longer than this is treated as failed
export const SPOOLER_COMMAND_TIMEOUT_MS = 10000;

/**
 * Shared plumbing for spoolers that drive the OS through command line tools.
 */
export abstract class CommandLineSpooler implements IPrintSpooler {
  constructor(
    protected readonly runner: CommandRunner,
    protected readonly timeoutMs: number = SPOOLER_COMMAND_TIMEOUT_MS
  ) {}

  abstract getDefaultPrinter(): Promise<string | undefined>;
  abstract setDefaultPrinter(name: string): Promise<void>;
  abstract submitPrint(filePath: string): Promise<void>;
  abstract enumeratePrinters(): Promise<string[]>;
  abstract enumerateJobs(printer: string): Promise<PrintJob[]>;

  protected exec(command: string, args: string[], options: RunOptions = {}): Promise<RunResult> {
    return this.runner.run(command, args, { timeoutMs: this.timeoutMs, ...options });
  }
}

export function outputLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
