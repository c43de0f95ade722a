import { describe, expect, it } from 'vitest';
import {
  CupsPrintSpooler,
  SPOOLER_COMMAND_TIMEOUT_MS,
  WindowsPrintSpooler,
  createPrintSpooler,
  psQuote,
} from '../../src/spoolers/index.js';
import type { CommandRunner, RunOptions, RunResult } from '../../src/utils/command-runner.js';

interface RecordedCommand {
  command: string;
  args: string[];
  options: RunOptions;
}

class ScriptedRunner implements CommandRunner {
  public readonly commands: RecordedCommand[] = [];

  constructor(private readonly outputs: string[] = []) {}

  async run(command: string, args: string[] = [], options: RunOptions = {}): Promise<RunResult> {
    this.commands.push({ command, args, options });
    return { stdout: this.outputs.shift() ?? '', stderr: '', exitCode: 0 };
  }

  get lastScript(): string {
    const last = this.commands.at(-1);
    return last ? (last.args.at(-1) ?? '') : '';
  }
}

describe('createPrintSpooler', () => {
  it('picks the PowerShell spooler on Windows and CUPS elsewhere', () => {
    const runner = new ScriptedRunner();
    expect(createPrintSpooler(runner, 'win32')).toBeInstanceOf(WindowsPrintSpooler);
    expect(createPrintSpooler(runner, 'linux')).toBeInstanceOf(CupsPrintSpooler);
    expect(createPrintSpooler(runner, 'darwin')).toBeInstanceOf(CupsPrintSpooler);
  });
});

describe('psQuote', () => {
  it('doubles single quotes', () => {
    expect(psQuote("O'Brien Laser")).toBe("'O''Brien Laser'");
  });
});

describe('WindowsPrintSpooler', () => {
  it('runs PowerShell non-interactively with a timeout', async () => {
    const runner = new ScriptedRunner(['HP1\r\n']);
    const spooler = new WindowsPrintSpooler(runner);

    expect(await spooler.getDefaultPrinter()).toBe('HP1');
    expect(runner.commands[0].command).toBe('powershell.exe');
    expect(runner.commands[0].args.slice(0, 3)).toEqual(['-NoProfile', '-NonInteractive', '-Command']);
    expect(runner.commands[0].options.timeoutMs).toBe(SPOOLER_COMMAND_TIMEOUT_MS);
  });

  it('reports no default printer for empty output', async () => {
    const spooler = new WindowsPrintSpooler(new ScriptedRunner(['\r\n']));
    expect(await spooler.getDefaultPrinter()).toBeUndefined();
  });

  it('quotes the printer name when switching the default', async () => {
    const runner = new ScriptedRunner();
    await new WindowsPrintSpooler(runner).setDefaultPrinter("Bob's Printer");

    expect(runner.lastScript).toContain("$name = 'Bob''s Printer'");
    expect(runner.lastScript).toContain('SetDefaultPrinter');
  });

  it('submits through the Print verb', async () => {
    const runner = new ScriptedRunner();
    await new WindowsPrintSpooler(runner).submitPrint('C:\\Archive\\invoice_42.pdf');

    expect(runner.lastScript).toBe(
      "Start-Process -FilePath 'C:\\Archive\\invoice_42.pdf' -Verb Print -WindowStyle Hidden"
    );
  });

  it('lists local printers one per line', async () => {
    const spooler = new WindowsPrintSpooler(new ScriptedRunner(['HP1\r\nHP2\r\n\r\n']));
    expect(await spooler.enumeratePrinters()).toEqual(['HP1', 'HP2']);
  });

  it('parses job lines', async () => {
    const spooler = new WindowsPrintSpooler(
      new ScriptedRunner(['12\tinvoice_42.pdf\r\n13\tMicrosoft Word - notes.docx\r\n'])
    );

    expect(await spooler.enumerateJobs('HP1')).toEqual([
      { id: 12, documentName: 'invoice_42.pdf' },
      { id: 13, documentName: 'Microsoft Word - notes.docx' },
    ]);
  });
});

describe('CupsPrintSpooler', () => {
  it('reads the system default destination', async () => {
    const runner = new ScriptedRunner(['system default destination: Office_Laser\n']);
    const spooler = new CupsPrintSpooler(runner);

    expect(await spooler.getDefaultPrinter()).toBe('Office_Laser');
    expect(runner.commands[0]).toMatchObject({ command: 'lpstat', args: ['-d'] });
  });

  it('reports no default when none is set', async () => {
    const spooler = new CupsPrintSpooler(new ScriptedRunner(['no system default destination\n']));
    expect(await spooler.getDefaultPrinter()).toBeUndefined();
  });

  it('sets the default with lpoptions and prints with lp', async () => {
    const runner = new ScriptedRunner();
    const spooler = new CupsPrintSpooler(runner);

    await spooler.setDefaultPrinter('HP2');
    await spooler.submitPrint('/archive/-invoice.pdf');

    expect(runner.commands.map(({ command, args }) => [command, ...args])).toEqual([
      ['lpoptions', '-d', 'HP2'],
      ['lp', '--', '/archive/-invoice.pdf'],
    ]);
  });

  it('lists printers from lpstat -p', async () => {
    const spooler = new CupsPrintSpooler(
      new ScriptedRunner([
        'printer HP1 is idle.  enabled since Mon 01 Jan 2024\nprinter HP2 disabled since Mon 01 Jan 2024 -\n\treason unknown\n',
      ])
    );

    expect(await spooler.enumeratePrinters()).toEqual(['HP1', 'HP2']);
  });

  it('parses lpq output', async () => {
    const runner = new ScriptedRunner([
      [
        'HP1 is ready and printing',
        'Rank    Owner   Job     File(s)                         Total Size',
        'active  tester  12      invoice_42.pdf                  1024 bytes',
        '1st     tester  13      monthly report.pdf              2048 bytes',
      ].join('\n'),
    ]);

    expect(await new CupsPrintSpooler(runner).enumerateJobs('HP1')).toEqual([
      { id: 12, documentName: 'invoice_42.pdf' },
      { id: 13, documentName: 'monthly report.pdf' },
    ]);
    expect(runner.commands[0]).toMatchObject({ command: 'lpq', args: ['-P', 'HP1'] });
  });
});
