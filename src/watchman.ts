// Watchman-backed directory watcher: one non-recursive subscription on the
// watched folder, reporting files as they appear.

import watchman from 'fb-watchman';
import { join } from 'path';
import { z } from 'zod';
import { describeError } from './errors.js';
import type { IDirectoryWatcher } from './interfaces.js';
import type { Logger } from './logger.js';
import type { WatchEvent } from './types.js';

export const SUBSCRIPTION_NAME = 'autoprint_downloads';

const WatchProjectResponseSchema = z.object({
  watch: z.string(),
  relative_path: z.string().optional(),
});

const ClockResponseSchema = z.object({
  clock: z.string(),
});

const SubscriptionEventSchema = z.object({
  subscription: z.string(),
  is_fresh_instance: z.boolean().optional(),
  files: z
    .array(
      z.object({
        name: z.string(),
        exists: z.boolean(),
        new: z.boolean().optional(),
        type: z.string().optional(),
      })
    )
    .optional(),
});

type WatchmanCallback = (error: Error | null | undefined, resp: unknown) => void;

/**
 * The part of the fb-watchman client the watcher talks to.
 */
export interface WatchmanConnection {
  capabilityCheck(
    caps: { optional: string[]; required: string[] },
    callback: WatchmanCallback
  ): void;
  command(args: unknown[], callback: WatchmanCallback): void;
  on(event: 'subscription' | 'error' | 'end', listener: (data: unknown) => void): unknown;
  end(): void;
}

export type WatchmanClientFactory = () => WatchmanConnection;

export class WatchmanDirectoryWatcher implements IDirectoryWatcher {
  private client?: WatchmanConnection;
  private watchRoot?: string;

  constructor(
    private readonly logger: Logger,
    private readonly createClient: WatchmanClientFactory = () => new watchman.Client()
  ) {}

  async start(directory: string, onEvent: (event: WatchEvent) => void): Promise<void> {
    if (this.client) {
      throw new Error('Watcher already started');
    }

    const client = this.createClient();
    this.client = client;

    client.on('error', (error: unknown) => {
      this.logger.error(`Watchman client error: ${describeError(error)}`);
    });
    client.on('end', () => {
      this.logger.warn('Watchman connection ended');
    });

    await new Promise<void>((resolve, reject) => {
      client.capabilityCheck({ optional: [], required: ['relative_root'] }, (error) => {
        if (error) {
          reject(new Error(`Watchman capability check failed: ${describeError(error)}`));
        } else {
          resolve();
        }
      });
    });

    const project = WatchProjectResponseSchema.parse(
      await this.command(['watch-project', directory])
    );
    this.watchRoot = project.watch;
    const { clock } = ClockResponseSchema.parse(await this.command(['clock', project.watch]));
    const base = project.relative_path ? join(project.watch, project.relative_path) : project.watch;

    client.on('subscription', (data: unknown) => {
      const parsed = SubscriptionEventSchema.safeParse(data);
      if (!parsed.success || parsed.data.subscription !== SUBSCRIPTION_NAME) {
        return;
      }
      // A fresh instance lists everything already present; only arrivals count
      if (parsed.data.is_fresh_instance) {
        this.logger.debug('Ignoring fresh-instance listing from Watchman');
        return;
      }

      for (const file of parsed.data.files ?? []) {
        if (!file.exists || (file.type !== undefined && file.type !== 'f')) continue;
        onEvent({
          path: join(base, file.name),
          kind: file.new ? 'created' : 'moved',
        });
      }
    });

    await this.command([
      'subscribe',
      project.watch,
      SUBSCRIPTION_NAME,
      {
        // Regular files directly inside the folder, no subdirectories
        expression: ['allof', ['type', 'f'], ['dirname', '', ['depth', 'eq', 0]]],
        fields: ['name', 'exists', 'new', 'type'],
        since: clock,
        ...(project.relative_path ? { relative_root: project.relative_path } : {}),
      },
    ]);

    this.logger.info(`Watching ${base}`);
  }

  async stop(): Promise<void> {
    const client = this.client;
    if (!client) return;

    if (this.watchRoot) {
      try {
        await this.command(['unsubscribe', this.watchRoot, SUBSCRIPTION_NAME]);
      } catch (error) {
        this.logger.warn(`Failed to unsubscribe: ${describeError(error)}`);
      }
    }

    client.end();
    this.client = undefined;
    this.watchRoot = undefined;
  }

  private command(args: unknown[]): Promise<unknown> {
    const client = this.client;
    if (!client) {
      return Promise.reject(new Error('Watcher not started'));
    }
    return new Promise((resolve, reject) => {
      client.command(args, (error, resp) => {
        if (error) {
          reject(error);
        } else {
          resolve(resp);
        }
      });
    });
  }
}
