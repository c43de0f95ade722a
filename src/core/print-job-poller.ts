import { basename } from 'path';
import { describeError } from '../errors.js';
import type { IPrintSpooler } from '../interfaces.js';
import type { Logger } from '../logger.js';
import type { PrintJob } from '../types.js';
import type { Clock } from '../utils/timing.js';

/**
 * Print submission is fire-and-forget, so completion is inferred from the
 * spooler: the job count has to stay unchanged for a few consecutive ticks
 * while no job carries the file's name.
 */
export type PollPhase = 'polling' | 'stable' | 'done';

export interface PrintPollState {
  baseFilename: string;
  lastJobCount: number;
  stableCount: number;
  startedAt: number;
  phase: PollPhase;
}

export interface SpoolerSnapshot {
  totalJobs: number;
  documentSighted: boolean;
}

export type PollReason = 'stable' | 'timeout' | 'unobservable';

export interface PollOutcome {
  reason: PollReason;
  ticks: number;
  elapsedMs: number;
}

export interface PrintJobPollerOptions {
  spooler: IPrintSpooler;
  logger: Logger;
  clock: Clock;
  intervalMs: number;
  stableTicks: number;
  timeoutMs: number;
}

export function initialPollState(filePath: string, startedAt: number): PrintPollState {
  return {
    baseFilename: basename(filePath),
    // No real count equals -1, so the first tick never counts as stable
    lastJobCount: -1,
    stableCount: 0,
    startedAt,
    phase: 'polling',
  };
}

/**
 * One tick of the state machine.
 */
export function advancePollState(
  state: PrintPollState,
  snapshot: SpoolerSnapshot,
  stableTicks: number
): PrintPollState {
  let stableCount: number;
  if (snapshot.documentSighted) {
    stableCount = 0;
  } else if (snapshot.totalJobs === state.lastJobCount) {
    stableCount = state.stableCount + 1;
  } else {
    stableCount = 0;
  }

  const phase: PollPhase =
    stableCount >= stableTicks ? 'done' : stableCount > 0 ? 'stable' : 'polling';

  return { ...state, lastJobCount: snapshot.totalJobs, stableCount, phase };
}

export class PrintJobPoller {
  private readonly spooler: IPrintSpooler;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly intervalMs: number;
  private readonly stableTicks: number;
  private readonly timeoutMs: number;

  constructor(options: PrintJobPollerOptions) {
    this.spooler = options.spooler;
    this.logger = options.logger;
    this.clock = options.clock;
    this.intervalMs = options.intervalMs;
    this.stableTicks = options.stableTicks;
    this.timeoutMs = options.timeoutMs;
  }

  public async waitForCompletion(filePath: string): Promise<PollOutcome> {
    let state = initialPollState(filePath, this.clock.now());
    let ticks = 0;

    this.logger.info('Waiting for print job...');

    for (;;) {
      ticks++;

      let snapshot: SpoolerSnapshot;
      try {
        snapshot = await this.snapshot(state.baseFilename);
      } catch (error) {
        this.logger.warn(`Spooler not observable, assuming print finished: ${describeError(error)}`);
        return this.finish('unobservable', ticks, state.startedAt);
      }

      state = advancePollState(state, snapshot, this.stableTicks);
      this.logger.debug(
        `Print poll tick ${ticks}: ${snapshot.totalJobs} job(s), stable ${state.stableCount}/${this.stableTicks}${snapshot.documentSighted ? ', document in queue' : ''}`
      );

      if (state.phase === 'done') {
        this.logger.info('Print job complete');
        return this.finish('stable', ticks, state.startedAt);
      }

      const elapsed = this.clock.now() - state.startedAt;
      if (elapsed >= this.timeoutMs) {
        this.logger.warn(`Stopped waiting for print job after ${elapsed}ms`);
        return this.finish('timeout', ticks, state.startedAt);
      }

      await this.clock.sleep(Math.min(this.intervalMs, this.timeoutMs - elapsed));
    }
  }

  private async snapshot(baseFilename: string): Promise<SpoolerSnapshot> {
    const needle = baseFilename.toLowerCase();
    let totalJobs = 0;
    let documentSighted = false;

    for (const printer of await this.spooler.enumeratePrinters()) {
      let jobs: PrintJob[];
      try {
        jobs = await this.spooler.enumerateJobs(printer);
      } catch (error) {
        // An offline printer is left out of the count; only losing the
        // printer list ends the wait
        this.logger.debug(`Skipping jobs of ${printer}: ${describeError(error)}`);
        continue;
      }
      totalJobs += jobs.length;
      if (jobs.some((job) => job.documentName.toLowerCase().includes(needle))) {
        documentSighted = true;
      }
    }

    return { totalJobs, documentSighted };
  }

  private finish(reason: PollReason, ticks: number, startedAt: number): PollOutcome {
    return { reason, ticks, elapsedMs: this.clock.now() - startedAt };
  }
}
