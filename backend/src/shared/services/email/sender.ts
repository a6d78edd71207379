import { logger } from '@shared/utils/logger.js';
import type { MailTransport } from './transports.js';
import type { NotificationQueue } from './queue.js';

export interface Notification {
  subject: string;
  recipients: string[];
  textBody: string;
  htmlBody: string;
}

export interface NotificationSenderOptions {
  transport: MailTransport | null;
  queue: NotificationQueue;
  from: string;
}

const log = logger.child('notifications');

/**
 * Fire-and-forget email. send() returns immediately; delivery happens on the queue.
 */
export class NotificationSender {
  private readonly transport: MailTransport | null;
  private readonly queue: NotificationQueue;
  private readonly from: string;

  constructor(options: NotificationSenderOptions) {
    this.transport = options.transport;
    this.queue = options.queue;
    this.from = options.from;
  }

  get enabled(): boolean {
    return this.transport !== null;
  }

  send(notification: Notification): void {
    const { transport } = this;
    if (!transport) {
      log.warn(`Email disabled, dropping "${notification.subject}" to ${notification.recipients.join(', ')}`);
      return;
    }

    this.queue.enqueue(notification.subject, async () => {
      const result = await transport.deliver({
        from: this.from,
        to: notification.recipients,
        subject: notification.subject,
        text: notification.textBody,
        html: notification.htmlBody,
      });
      if (!result.success) {
        throw new Error(`${transport.name} delivery failed: ${result.error ?? 'unknown error'}`);
      }
      log.debug(`Sent "${notification.subject}" via ${transport.name}`);
    });
  }
}
