import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArchiveMover } from '../src/core/archive-mover.js';
import { FileProcessor } from '../src/core/file-processor.js';
import { PrintJobPoller } from '../src/core/print-job-poller.js';
import { PrintOrchestrator } from '../src/core/print-orchestrator.js';
import { type ReadinessProbe, ReadinessWaiter } from '../src/core/readiness-waiter.js';
import { Reporter } from '../src/core/reporter.js';
import { Messages } from '../src/messages.js';
import type { QueueItem, Rule } from '../src/types.js';
import {
  FakeClock,
  FakeSpooler,
  FixedConfirmer,
  RecordingNotifier,
  createMockLogger,
  createRule,
} from './helpers.js';

describe('FileProcessor', () => {
  let root: string;
  let downloads: string;
  let source: string;
  let spooler: FakeSpooler;
  let notifier: RecordingNotifier;
  let clock: FakeClock;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'autoprint-processor-'));
    downloads = join(root, 'downloads');
    mkdirSync(downloads);
    source = join(downloads, 'invoice_42.pdf');
    writeFileSync(source, 'pdf');
    spooler = new FakeSpooler('HP1', ['HP1', 'HP2']);
    notifier = new RecordingNotifier();
    clock = new FakeClock();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function createProcessor(options: { probe?: ReadinessProbe; confirm?: boolean } = {}) {
    const logger = createMockLogger();
    const reporter = new Reporter(notifier, new Messages('en'), logger);
    return new FileProcessor({
      waiter: new ReadinessWaiter({
        attempts: 10,
        intervalMs: 500,
        sleep: clock.sleep,
        logger,
        probe: options.probe,
      }),
      mover: new ArchiveMover({ attempts: 3, backoffMs: 1000, sleep: clock.sleep, logger }),
      orchestrator: new PrintOrchestrator({
        spooler,
        confirmer: new FixedConfirmer(options.confirm ?? true),
        poller: new PrintJobPoller({
          spooler,
          logger,
          clock,
          intervalMs: 1000,
          stableTicks: 3,
          timeoutMs: 15000,
        }),
        reporter,
        logger,
        settleMs: 10000,
        sleep: clock.sleep,
      }),
      reporter,
      logger,
    });
  }

  function item(rule: Rule, destinationDir: string): QueueItem {
    return { path: source, rule, groups: { number: '42' }, destinationDir };
  }

  const invoiceRule = (overrides: Partial<Rule> = {}): Rule =>
    createRule({
      pattern: 'invoice_(?<number>\\d+)\\.pdf',
      printMode: 'always',
      printer: 'HP2',
      ...overrides,
    });

  it('archives, then prints on the rule printer and restores the default', async () => {
    const destinationDir = join(root, 'archive', 'invoices', '42');

    const outcome = await createProcessor().process(item(invoiceRule(), destinationDir));

    expect(outcome).toMatchObject({
      status: 'archived',
      destinationPath: join(destinationDir, 'invoice_42.pdf'),
      print: { status: 'printed', printer: 'HP2' },
    });
    expect(existsSync(source)).toBe(false);
    expect(existsSync(join(destinationDir, 'invoice_42.pdf'))).toBe(true);
    expect(spooler.calls).toEqual([
      'getDefault',
      'setDefault:HP2',
      `submit:${join(destinationDir, 'invoice_42.pdf')}`,
      'setDefault:HP1',
    ]);
    expect(notifier.notifications).toEqual([
      {
        title: 'File archived',
        message: `invoice_42.pdf moved to ${destinationDir}`,
        success: true,
      },
      { title: 'Printing', message: 'invoice_42.pdf sent to HP2', success: true },
    ]);
  });

  it('archives without touching the printer when the user declines', async () => {
    const destinationDir = join(root, 'archive');

    const outcome = await createProcessor({ confirm: false }).process(
      item(invoiceRule({ printMode: 'prompt' }), destinationDir)
    );

    expect(outcome).toMatchObject({ status: 'archived', print: { status: 'declined' } });
    expect(spooler.calls).toEqual([]);
    expect(notifier.titles).toEqual(['File archived', 'Archived without printing']);
  });

  it('leaves the file in place when the destination already has it', async () => {
    const destinationDir = join(root, 'archive');
    mkdirSync(destinationDir);
    writeFileSync(join(destinationDir, 'invoice_42.pdf'), 'older');

    const outcome = await createProcessor().process(item(invoiceRule(), destinationDir));

    expect(outcome).toEqual({
      status: 'exists',
      destinationPath: join(destinationDir, 'invoice_42.pdf'),
    });
    expect(existsSync(source)).toBe(true);
    expect(spooler.calls).toEqual([]);
    expect(notifier.notifications).toEqual([
      {
        title: 'Already archived',
        message: `invoice_42.pdf already exists in ${destinationDir}`,
        success: false,
      },
    ]);
  });

  it('reports a file that stays locked and leaves it in place', async () => {
    const outcome = await createProcessor({ probe: async () => 'locked' }).process(
      item(invoiceRule(), join(root, 'archive'))
    );

    expect(outcome).toEqual({ status: 'lock-timeout' });
    expect(existsSync(source)).toBe(true);
    expect(clock.sleeps).toHaveLength(9);
    expect(notifier.notifications).toEqual([
      {
        title: 'File still in use',
        message: 'invoice_42.pdf stayed locked and was left in place',
        success: false,
      },
    ]);
  });

  it('drops a file that vanished before it became ready', async () => {
    const outcome = await createProcessor({ probe: async () => 'gone' }).process(
      item(invoiceRule(), join(root, 'archive'))
    );

    expect(outcome).toEqual({ status: 'gone' });
    expect(notifier.notifications).toEqual([]);
  });

  it('turns unexpected failures into a notification instead of throwing', async () => {
    // The destination sits below a regular file, so it cannot be created
    const blocker = join(root, 'blocker');
    writeFileSync(blocker, '');

    const outcome = await createProcessor().process(item(invoiceRule(), join(blocker, 'sub')));

    expect(outcome.status).toBe('error');
    expect(existsSync(source)).toBe(true);
    expect(notifier.notifications).toHaveLength(1);
    expect(notifier.notifications[0]).toMatchObject({
      title: 'Processing failed',
      success: false,
    });
  });
});
