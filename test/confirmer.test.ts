import { PassThrough } from 'stream';
import { describe, expect, it } from 'vitest';
import { ConsolePrintConfirmer } from '../src/confirmer.js';
import { Messages } from '../src/messages.js';
import { createMockLogger } from './helpers.js';

function createConfirmer(language = 'en', timeoutMs = 1000) {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = '';
  output.on('data', (chunk: Buffer) => {
    written += chunk.toString();
  });
  const confirmer = new ConsolePrintConfirmer(new Messages(language), createMockLogger(), {
    input,
    output,
    interactive: true,
    timeoutMs,
  });
  return { confirmer, input, written: () => written };
}

describe('ConsolePrintConfirmer', () => {
  it('asks the localized question and accepts yes', async () => {
    const { confirmer, input, written } = createConfirmer();

    const answer = confirmer.confirm('invoice_42.pdf');
    input.write('y\n');

    expect(await answer).toBe(true);
    expect(written()).toBe('Print invoice_42.pdf? [y/N] ');
  });

  it('accepts the German answer in German', async () => {
    const { confirmer, input } = createConfirmer('de');

    const answer = confirmer.confirm('invoice_42.pdf');
    input.write(' Ja \n');

    expect(await answer).toBe(true);
  });

  it('treats anything else as no', async () => {
    const { confirmer, input } = createConfirmer();

    const answer = confirmer.confirm('invoice_42.pdf');
    input.write('nope\n');

    expect(await answer).toBe(false);
  });

  it('answers no when the input closes', async () => {
    const { confirmer, input } = createConfirmer();

    const answer = confirmer.confirm('invoice_42.pdf');
    input.end();

    expect(await answer).toBe(false);
  });

  it('answers no after the timeout', async () => {
    const { confirmer } = createConfirmer('en', 10);

    expect(await confirmer.confirm('invoice_42.pdf')).toBe(false);
  });

  it('does not ask without a terminal', async () => {
    const logger = createMockLogger();
    const confirmer = new ConsolePrintConfirmer(new Messages('en'), logger, {
      interactive: false,
    });

    expect(await confirmer.confirm('invoice_42.pdf')).toBe(false);
    expect(logger.info).toHaveBeenCalledWith(
      'No terminal to ask whether to print invoice_42.pdf, skipping print'
    );
  });
});
