import { basename } from 'path';
import { ArchiveMover } from './core/archive-mover.js';
import { DedupGate } from './core/dedup-gate.js';
import { FileProcessor, type ProcessOutcome } from './core/file-processor.js';
import { PatternMatcher, expandDestination } from './core/pattern-matcher.js';
import { PrintJobPoller } from './core/print-job-poller.js';
import { PrintOrchestrator } from './core/print-orchestrator.js';
import { ReadinessWaiter } from './core/readiness-waiter.js';
import { Reporter } from './core/reporter.js';
import { WorkQueue } from './core/work-queue.js';
import { describeError } from './errors.js';
import type { AutoprintDependencies, IDirectoryWatcher } from './interfaces.js';
import type { Logger } from './logger.js';
import { Messages } from './messages.js';
import type { AutoprintConfig, QueueItem, WatchEvent } from './types.js';
import { type Clock, systemClock } from './utils/timing.js';

/**
 * Watches one folder, archives matching files and prints them as their rule
 * asks. Events are matched and deduplicated synchronously on arrival; all
 * file and printer work runs on a single worker, one file at a time.
 */
export class Autoprint {
  private readonly config: AutoprintConfig;
  private readonly logger: Logger;
  private readonly watcher: IDirectoryWatcher;
  private readonly matcher: PatternMatcher;
  private readonly gate: DedupGate;
  private queue = new WorkQueue<QueueItem>();
  private readonly processor: FileProcessor;
  private readonly reporter: Reporter;
  private readonly outcomeHooks: Array<(item: QueueItem, outcome: ProcessOutcome) => void> = [];
  private worker?: Promise<void>;
  private isRunning = false;

  constructor(config: AutoprintConfig, logger: Logger, deps: AutoprintDependencies) {
    this.config = config;
    this.logger = logger;
    this.watcher = deps.watcher;

    const clock: Clock = deps.clock ?? systemClock;
    const now = (): number => clock.now();
    const sleep = (ms: number): Promise<void> => clock.sleep(ms);
    const { timing } = config;
    const messages = new Messages(config.language);

    this.reporter = new Reporter(deps.notifier, messages, logger);
    this.matcher = new PatternMatcher(config.rules, logger);
    this.gate = new DedupGate(config.dedupeTtlSeconds, now);

    const poller = new PrintJobPoller({
      spooler: deps.spooler,
      logger,
      clock,
      intervalMs: timing.pollIntervalMs,
      stableTicks: timing.pollStableTicks,
      timeoutMs: timing.pollTimeoutMs,
    });

    this.processor = new FileProcessor({
      waiter: new ReadinessWaiter({
        attempts: timing.lockAttempts,
        intervalMs: timing.lockIntervalMs,
        sleep,
        logger,
      }),
      mover: new ArchiveMover({
        attempts: timing.moveAttempts,
        backoffMs: timing.moveBackoffMs,
        sleep,
        logger,
      }),
      orchestrator: new PrintOrchestrator({
        spooler: deps.spooler,
        confirmer: deps.confirmer,
        poller,
        reporter: this.reporter,
        logger,
        defaultPrinter: config.defaultPrinter,
        settleMs: timing.printSettleMs,
        sleep,
      }),
      reporter: this.reporter,
      logger,
    });
  }

  public async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error('Autoprint is already running');
    }
    this.isRunning = true;

    // A closed queue stays closed, so every run gets its own
    const queue = new WorkQueue<QueueItem>();
    this.queue = queue;
    this.worker = queue.drain(
      async (item) => {
        const outcome = await this.processor.process(item);
        for (const hook of this.outcomeHooks) {
          hook(item, outcome);
        }
      },
      (error, item) => {
        this.logger.error(`Worker failed on ${basename(item.path)}: ${describeError(error)}`);
      }
    );

    try {
      await this.watcher.start(this.config.watchDirectory, (event) => {
        this.handleEvent(event);
      });
    } catch (error) {
      queue.close();
      await this.worker;
      this.worker = undefined;
      this.isRunning = false;
      throw error;
    }

    this.logger.info(
      `Watching ${this.config.watchDirectory} with ${this.config.rules.length} pattern(s)`
    );
    await this.reporter.serviceStarted(this.config.watchDirectory);
  }

  /**
   * Match, deduplicate and enqueue one watcher event. Runs to completion
   * without yielding, so two deliveries of the same path cannot both pass
   * the gate. Returns whether the file was queued.
   */
  public handleEvent(event: WatchEvent): boolean {
    const filename = basename(event.path);
    const match = this.matcher.match(filename);
    if (!match) {
      return false;
    }

    if (!this.gate.admit(event.path)) {
      this.logger.debug(`Duplicate ${event.kind} event ignored: ${filename}`);
      return false;
    }

    const item: QueueItem = Object.freeze({
      path: event.path,
      rule: match.rule,
      groups: Object.freeze({ ...match.groups }),
      destinationDir: expandDestination(match.rule.destination, match.groups),
    });

    if (!this.queue.enqueue(item)) {
      this.logger.warn(`Shutting down, not processing ${filename}`);
      return false;
    }
    this.logger.debug(`Queued ${filename} (${this.queue.pending} pending)`);
    return true;
  }

  /**
   * Stop watching, let the worker finish what is already queued, then
   * return.
   */
  public async stop(): Promise<void> {
    if (!this.isRunning) return;
    this.isRunning = false;

    try {
      await this.watcher.stop();
    } catch (error) {
      this.logger.warn(`Failed to stop watcher: ${describeError(error)}`);
    }

    this.queue.close();
    await this.worker;
    this.worker = undefined;

    this.logger.info('Autoprint stopped');
    await this.reporter.serviceStopped(this.config.watchDirectory);
  }

  public onOutcome(hook: (item: QueueItem, outcome: ProcessOutcome) => void): void {
    this.outcomeHooks.push(hook);
  }

  public get running(): boolean {
    return this.isRunning;
  }
}
