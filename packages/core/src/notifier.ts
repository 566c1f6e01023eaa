import type { Logger } from 'winston';

export type NotificationPriority = 'LOW' | 'MEDIUM' | 'HIGH' | 'URGENT';

/** Outbound message handed to the notification collaborator */
export interface Notification {
  recipients: string[];
  subject: string;
  body: string;
  priority: NotificationPriority;
}

/**
 * Delivery collaborator (email, SMS, chat). A rejected promise means the
 * message was not delivered; callers decide whether that matters.
 */
export interface Notifier {
  send(notification: Notification): Promise<void>;
}

/** Result of a best-effort delivery attempt */
export interface DeliveryOutcome {
  delivered: boolean;
  recipientCount: number;
  error?: string;
}

export interface DeliverOptions {
  /** Give up and report not delivered after this many milliseconds */
  timeoutMs?: number;
}

/**
 * Send a notification and report the outcome instead of throwing.
 * An empty recipient list counts as not delivered.
 */
export async function deliver(
  notifier: Notifier,
  notification: Notification,
  options: DeliverOptions = {},
): Promise<DeliveryOutcome> {
  const recipients = [...new Set(notification.recipients.filter((r) => r.trim() !== ''))];
  if (recipients.length === 0) {
    return { delivered: false, recipientCount: 0, error: 'no recipients' };
  }

  let timer: NodeJS.Timeout | undefined;
  try {
    const attempts: Promise<void>[] = [notifier.send({ ...notification, recipients })];
    if (options.timeoutMs !== undefined) {
      const { timeoutMs } = options;
      attempts.push(
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error(`delivery timed out after ${timeoutMs}ms`)), timeoutMs);
        }),
      );
    }
    await Promise.race(attempts);
    return { delivered: true, recipientCount: recipients.length };
  } catch (err) {
    return {
      delivered: false,
      recipientCount: 0,
      error: err instanceof Error ? err.message : String(err),
    };
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Notifier that writes messages to the log. Useful for local development
 * where no mail transport is configured.
 */
export function createLogNotifier(logger: Logger): Notifier {
  return {
    async send(notification: Notification): Promise<void> {
      logger.info('notification', {
        recipients: notification.recipients,
        subject: notification.subject,
        priority: notification.priority,
      });
    },
  };
}
