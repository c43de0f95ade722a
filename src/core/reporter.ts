import { basename } from 'path';
import { describeError } from '../errors.js';
import type { INotifier } from '../interfaces.js';
import type { Logger } from '../logger.js';
import type { MessageId, Messages } from '../messages.js';

type Topic =
  | 'archived'
  | 'archivedWithoutPrinting'
  | 'printStarted'
  | 'lockTimeout'
  | 'destinationExists'
  | 'moveFailed'
  | 'printFailed'
  | 'processingFailed';

/**
 * Turns pipeline outcomes into localized notifications. Delivery problems
 * are logged and never reach the pipeline.
 */
export class Reporter {
  constructor(
    private readonly notifier: INotifier,
    private readonly messages: Messages,
    private readonly logger: Logger
  ) {}

  async archived(filePath: string, destinationDir: string): Promise<void> {
    await this.send('archived', true, { file: basename(filePath), destination: destinationDir });
  }

  async archivedWithoutPrinting(filePath: string): Promise<void> {
    await this.send('archivedWithoutPrinting', true, { file: basename(filePath) });
  }

  async printStarted(filePath: string, printer: string): Promise<void> {
    await this.send('printStarted', true, { file: basename(filePath), printer });
  }

  async lockTimeout(filePath: string): Promise<void> {
    await this.send('lockTimeout', false, { file: basename(filePath) });
  }

  async destinationExists(filePath: string, destinationDir: string): Promise<void> {
    await this.send('destinationExists', false, {
      file: basename(filePath),
      destination: destinationDir,
    });
  }

  async moveFailed(filePath: string, error: unknown): Promise<void> {
    await this.send('moveFailed', false, { file: basename(filePath), reason: describeError(error) });
  }

  async printFailed(filePath: string, error: unknown): Promise<void> {
    await this.send('printFailed', false, {
      file: basename(filePath),
      reason: describeError(error),
    });
  }

  async processingFailed(filePath: string, error: unknown): Promise<void> {
    await this.send('processingFailed', false, {
      file: basename(filePath),
      reason: describeError(error),
    });
  }

  async serviceStarted(directory: string): Promise<void> {
    await this.deliver('service.started.title', 'service.started.body', true, { directory });
  }

  async serviceStopped(directory: string): Promise<void> {
    await this.deliver('service.stopped.title', 'service.stopped.body', true, { directory });
  }

  private async send(topic: Topic, success: boolean, params: Record<string, string>): Promise<void> {
    await this.deliver(`${topic}.title`, `${topic}.body`, success, params);
  }

  private async deliver(
    titleId: MessageId,
    bodyId: MessageId,
    success: boolean,
    params: Record<string, string>
  ): Promise<void> {
    const title = this.messages.format(titleId, params);
    const message = this.messages.format(bodyId, params);
    try {
      await this.notifier.notify(title, message, success);
    } catch (error) {
      this.logger.warn(`Notification failed: ${describeError(error)}`);
    }
  }
}
