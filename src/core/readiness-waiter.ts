import { type FileHandle, open } from 'fs/promises';
import { LockTimeoutError, isErrnoException } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Sleep } from '../utils/timing.js';

export type ReadinessStatus = 'ready' | 'locked' | 'gone';

export type ReadinessProbe = (filePath: string) => Promise<ReadinessStatus>;

export type ReadinessResult =
  | { status: 'ready'; attempts: number }
  | { status: 'gone'; attempts: number }
  | { status: 'timeout'; attempts: number; error: LockTimeoutError };

/**
 * Open for read/write and close again. A writer holding the file with
 * sharing denied makes the open fail; a missing file means it was moved or
 * deleted by someone else.
 */
export const probeFileReadiness: ReadinessProbe = async (filePath) => {
  let handle: FileHandle | undefined;
  try {
    handle = await open(filePath, 'r+');
    return 'ready';
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return 'gone';
    }
    return 'locked';
  } finally {
    await handle?.close();
  }
};

export interface ReadinessWaiterOptions {
  attempts: number;
  intervalMs: number;
  sleep: Sleep;
  logger: Logger;
  probe?: ReadinessProbe;
}

export class ReadinessWaiter {
  private readonly attempts: number;
  private readonly intervalMs: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly probe: ReadinessProbe;

  constructor(options: ReadinessWaiterOptions) {
    this.attempts = options.attempts;
    this.intervalMs = options.intervalMs;
    this.sleep = options.sleep;
    this.logger = options.logger;
    this.probe = options.probe ?? probeFileReadiness;
  }

  public async waitUntilReady(filePath: string): Promise<ReadinessResult> {
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      const status = await this.probe(filePath);

      if (status === 'ready') {
        return { status: 'ready', attempts: attempt };
      }
      if (status === 'gone') {
        this.logger.info(`File disappeared while waiting: ${filePath}`);
        return { status: 'gone', attempts: attempt };
      }

      this.logger.debug(`Still locked (attempt ${attempt}/${this.attempts}): ${filePath}`);
      if (attempt < this.attempts) {
        await this.sleep(this.intervalMs);
      }
    }

    return {
      status: 'timeout',
      attempts: this.attempts,
      error: new LockTimeoutError(filePath, this.attempts),
    };
  }
}
