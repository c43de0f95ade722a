// Spooler factory and exports

import type { IPrintSpooler } from '../interfaces.js';
import { ChildProcessRunner, type CommandRunner } from '../utils/command-runner.js';
import { CupsPrintSpooler } from './cups-spooler.js';
import { WindowsPrintSpooler } from './windows-spooler.js';

export * from './base-spooler.js';
export * from './cups-spooler.js';
export * from './windows-spooler.js';

export function createPrintSpooler(
  runner: CommandRunner = new ChildProcessRunner(),
  platform: NodeJS.Platform = process.platform
): IPrintSpooler {
  if (platform === 'win32') {
    return new WindowsPrintSpooler(runner);
  }
  return new CupsPrintSpooler(runner);
}
