import notifier from 'node-notifier';
import { describeError } from './errors.js';
import type { INotifier } from './interfaces.js';
import type { Logger } from './logger.js';

interface ExtendedNotification extends notifier.Notification {
  sound?: string | boolean;
  timeout?: number;
}

export interface DesktopNotifierConfig {
  enabled: boolean;
}

/**
 * Desktop notifications through node-notifier. Delivery is best-effort:
 * errors are logged, never thrown.
 */
export class DesktopNotifier implements INotifier {
  constructor(
    private readonly config: DesktopNotifierConfig,
    private readonly logger: Logger
  ) {}

  async notify(title: string, message: string, success: boolean): Promise<void> {
    if (!this.config.enabled || process.env.AUTOPRINT_NOTIFICATIONS === 'false') {
      return;
    }

    const notification: ExtendedNotification = {
      title,
      message,
      sound: success ? false : 'Basso',
      timeout: success ? 3 : 10,
    };

    try {
      notifier.notify(notification, (error) => {
        if (error) {
          this.logger.warn(`Notification failed: ${describeError(error)}`);
        }
      });
    } catch (error) {
      this.logger.warn(`Notification failed: ${describeError(error)}`);
    }
  }
}
