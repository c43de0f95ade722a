import { mkdir } from 'fs/promises';
import { basename, join } from 'path';
import { DestinationExistsError, MoveRetryExhaustedError, describeError } from '../errors.js';
import type { Logger } from '../logger.js';
import { moveFile, pathExists } from '../utils/filesystem.js';
import type { Sleep } from '../utils/timing.js';

export type MoveFn = (sourcePath: string, destinationPath: string) => Promise<void>;

export type MoveResult =
  | { status: 'moved'; destinationPath: string; attempts: number }
  | { status: 'exists'; destinationPath: string; error: DestinationExistsError }
  | { status: 'failed'; destinationPath: string; attempts: number; error: MoveRetryExhaustedError };

export interface ArchiveMoverOptions {
  attempts: number;
  backoffMs: number;
  sleep: Sleep;
  logger: Logger;
  move?: MoveFn;
}

/**
 * Moves a file into its archive directory. The archive is append-only: an
 * existing file at the destination is never replaced.
 */
export class ArchiveMover {
  private readonly attempts: number;
  private readonly backoffMs: number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly move: MoveFn;

  constructor(options: ArchiveMoverOptions) {
    this.attempts = options.attempts;
    this.backoffMs = options.backoffMs;
    this.sleep = options.sleep;
    this.logger = options.logger;
    this.move = options.move ?? moveFile;
  }

  public async archive(sourcePath: string, destinationDir: string): Promise<MoveResult> {
    const destinationPath = join(destinationDir, basename(sourcePath));

    await mkdir(destinationDir, { recursive: true });

    if (await pathExists(destinationPath)) {
      this.logger.warn(`File already exists at destination: ${destinationPath}`);
      return {
        status: 'exists',
        destinationPath,
        error: new DestinationExistsError(destinationPath),
      };
    }

    let lastError: unknown;
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      try {
        await this.move(sourcePath, destinationPath);
        this.logger.info(`Moved to ${destinationPath}`);
        return { status: 'moved', destinationPath, attempts: attempt };
      } catch (error) {
        lastError = error;
        this.logger.warn(
          `Move attempt ${attempt}/${this.attempts} failed: ${describeError(error)}`
        );
        if (attempt < this.attempts) {
          await this.sleep(this.backoffMs);
        }
      }
    }

    const error = new MoveRetryExhaustedError(sourcePath, destinationPath, this.attempts, lastError);
    this.logger.error(error.message);
    return { status: 'failed', destinationPath, attempts: this.attempts, error };
  }
}
