import type { PrintJob } from '../types.js';
import { CommandLineSpooler, outputLines } from './base-spooler.js';

/**
 * Single-quoted PowerShell literal
 */
export function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Windows print subsystem through PowerShell: the CIM Win32_Printer class for
 * the default printer, the shell "Print" verb for submission and the
 * PrintManagement cmdlets for queue contents.
 */
export class WindowsPrintSpooler extends CommandLineSpooler {
  async getDefaultPrinter(): Promise<string | undefined> {
    const output = await this.powershell(
      "(Get-CimInstance -ClassName Win32_Printer -Filter 'Default=TRUE').Name"
    );
    const [name] = outputLines(output);
    return name;
  }

  async setDefaultPrinter(name: string): Promise<void> {
    await this.powershell(
      [
        `$name = ${psQuote(name)}`,
        '$printer = Get-CimInstance -ClassName Win32_Printer | Where-Object { $_.Name -eq $name }',
        'if (-not $printer) { throw "Printer not found: $name" }',
        'Invoke-CimMethod -InputObject $printer -MethodName SetDefaultPrinter | Out-Null',
      ].join('; ')
    );
  }

  async submitPrint(filePath: string): Promise<void> {
    await this.powershell(
      `Start-Process -FilePath ${psQuote(filePath)} -Verb Print -WindowStyle Hidden`
    );
  }

  async enumeratePrinters(): Promise<string[]> {
    const output = await this.powershell(
      "Get-Printer | Where-Object { $_.Type -eq 'Local' } | Select-Object -ExpandProperty Name"
    );
    return outputLines(output);
  }

  async enumerateJobs(printer: string): Promise<PrintJob[]> {
    const output = await this.powershell(
      `Get-PrintJob -PrinterName ${psQuote(printer)} | ForEach-Object { "$($_.Id)\`t$($_.DocumentName)" }`
    );
    return outputLines(output).map(parseJobLine);
  }

  private async powershell(script: string): Promise<string> {
    const { stdout } = await this.exec('powershell.exe', [
      '-NoProfile',
      '-NonInteractive',
      '-Command',
      script,
    ]);
    return stdout;
  }
}

// "<id>\t<document name>"
function parseJobLine(line: string): PrintJob {
  const tab = line.indexOf('\t');
  if (tab === -1) {
    return { documentName: line };
  }
  const id = Number.parseInt(line.slice(0, tab), 10);
  return {
    ...(Number.isNaN(id) ? {} : { id }),
    documentName: line.slice(tab + 1).trim(),
  };
}
