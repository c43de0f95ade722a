import type { PrintJob } from '../types.js';
import { CommandLineSpooler, outputLines } from './base-spooler.js';

// active  alice  12  invoice_42.pdf  1024 bytes
const LPQ_JOB = /^(\S+)\s+(\S+)\s+(\d+)\s+(.+?)\s+\d+\s+bytes$/;

/**
 * CUPS print subsystem (Linux, macOS) through lpstat, lpoptions, lp and lpq.
 */
export class CupsPrintSpooler extends CommandLineSpooler {
  async getDefaultPrinter(): Promise<string | undefined> {
    const { stdout } = await this.exec('lpstat', ['-d'], { allowNonZeroExit: true });
    // "system default destination: HP1" or "no system default destination"
    const match = stdout.match(/default destination:\s*(\S+)/);
    return match?.[1];
  }

  async setDefaultPrinter(name: string): Promise<void> {
    await this.exec('lpoptions', ['-d', name]);
  }

  async submitPrint(filePath: string): Promise<void> {
    await this.exec('lp', ['--', filePath]);
  }

  async enumeratePrinters(): Promise<string[]> {
    const { stdout } = await this.exec('lpstat', ['-p'], { allowNonZeroExit: true });
    const printers: string[] = [];
    for (const line of outputLines(stdout)) {
      const match = line.match(/^printer\s+(\S+)/);
      if (match) printers.push(match[1]);
    }
    return printers;
  }

  async enumerateJobs(printer: string): Promise<PrintJob[]> {
    const { stdout } = await this.exec('lpq', ['-P', printer]);
    const jobs: PrintJob[] = [];
    for (const line of outputLines(stdout)) {
      const match = line.match(LPQ_JOB);
      if (match) {
        jobs.push({ id: Number.parseInt(match[3], 10), documentName: match[4] });
      }
    }
    return jobs;
  }
}
