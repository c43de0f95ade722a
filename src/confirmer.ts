import { createInterface } from 'readline';
import { describeError } from './errors.js';
import type { IPrintConfirmer } from './interfaces.js';
import type { Logger } from './logger.js';
import type { Messages } from './messages.js';

export interface ConsoleConfirmerOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Defaults to whether stdin is a terminal */
  interactive?: boolean;
  /** Give up and answer "no" after this long */
  timeoutMs?: number;
}

const YES = new Set(['y', 'yes', 'j', 'ja']);

/**
 * Asks on the terminal before printing. Without a terminal, or when anything
 * goes wrong, the answer is no.
 */
export class ConsolePrintConfirmer implements IPrintConfirmer {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly interactive: boolean;
  private readonly timeoutMs: number;

  constructor(
    private readonly messages: Messages,
    private readonly logger: Logger,
    options: ConsoleConfirmerOptions = {}
  ) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.interactive = options.interactive ?? process.stdin.isTTY === true;
    this.timeoutMs = options.timeoutMs ?? 60000;
  }

  async confirm(filename: string): Promise<boolean> {
    if (!this.interactive) {
      this.logger.info(`No terminal to ask whether to print ${filename}, skipping print`);
      return false;
    }

    try {
      const answer = await this.ask(this.messages.format('confirm.question', { file: filename }));
      return YES.has(answer.trim().toLowerCase());
    } catch (error) {
      this.logger.warn(`Print confirmation failed: ${describeError(error)}`);
      return false;
    }
  }

  private ask(question: string): Promise<string> {
    const rl = createInterface({ input: this.input, output: this.output, terminal: false });
    return new Promise<string>((resolve) => {
      const timer = setTimeout(() => {
        resolve('');
        rl.close();
      }, this.timeoutMs);

      rl.once('close', () => {
        clearTimeout(timer);
        resolve('');
      });
      rl.question(question, (answer) => {
        clearTimeout(timer);
        resolve(answer);
        rl.close();
      });
    });
  }
}
