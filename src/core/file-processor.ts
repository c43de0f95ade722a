import { basename } from 'path';
import { describeError } from '../errors.js';
import { type Logger, createScopedLogger } from '../logger.js';
import type { QueueItem } from '../types.js';
import type { ArchiveMover } from './archive-mover.js';
import type { PrintOrchestrator, PrintOutcome } from './print-orchestrator.js';
import type { ReadinessWaiter } from './readiness-waiter.js';
import type { Reporter } from './reporter.js';

export type ProcessOutcome =
  | { status: 'gone' }
  | { status: 'lock-timeout' }
  | { status: 'exists'; destinationPath: string }
  | { status: 'move-failed'; destinationPath: string }
  | { status: 'archived'; destinationPath: string; print: PrintOutcome }
  | { status: 'error'; error: unknown };

export interface FileProcessorOptions {
  waiter: ReadinessWaiter;
  mover: ArchiveMover;
  orchestrator: PrintOrchestrator;
  reporter: Reporter;
  logger: Logger;
}

/**
 * Body of the single worker: readiness → archive → print for one item.
 * Every failure stops at this boundary so the next item still runs.
 */
export class FileProcessor {
  private readonly waiter: ReadinessWaiter;
  private readonly mover: ArchiveMover;
  private readonly orchestrator: PrintOrchestrator;
  private readonly reporter: Reporter;
  private readonly logger: Logger;

  constructor(options: FileProcessorOptions) {
    this.waiter = options.waiter;
    this.mover = options.mover;
    this.orchestrator = options.orchestrator;
    this.reporter = options.reporter;
    this.logger = options.logger;
  }

  public async process(item: QueueItem): Promise<ProcessOutcome> {
    const logger = createScopedLogger(this.logger, basename(item.path));

    try {
      const readiness = await this.waiter.waitUntilReady(item.path);
      if (readiness.status === 'gone') {
        return { status: 'gone' };
      }
      if (readiness.status === 'timeout') {
        logger.error(readiness.error.message);
        await this.reporter.lockTimeout(item.path);
        return { status: 'lock-timeout' };
      }

      const moved = await this.mover.archive(item.path, item.destinationDir);
      if (moved.status === 'exists') {
        await this.reporter.destinationExists(item.path, item.destinationDir);
        return { status: 'exists', destinationPath: moved.destinationPath };
      }
      if (moved.status === 'failed') {
        await this.reporter.moveFailed(item.path, moved.error);
        return { status: 'move-failed', destinationPath: moved.destinationPath };
      }

      logger.success(`Archived to ${moved.destinationPath}`);
      await this.reporter.archived(item.path, item.destinationDir);

      const print = await this.orchestrator.handle(moved.destinationPath, item.rule);
      return { status: 'archived', destinationPath: moved.destinationPath, print };
    } catch (error) {
      logger.error(`Processing failed: ${describeError(error)}`);
      await this.reporter.processingFailed(item.path, error);
      return { status: 'error', error };
    }
  }
}
