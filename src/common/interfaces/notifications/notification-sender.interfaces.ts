import type { NotificationKind } from '../../../modules/notifications/entities/reminder.interfaces';

export interface IReminderMessage {
  readonly userId: string;
  readonly kind: NotificationKind;
  readonly title: string;
  readonly body: string;
  readonly data: Readonly<Record<string, string>>;
}

export interface IDeliveryResult {
  readonly delivered: boolean;
  readonly failureReason: string | null;
}

/**
 * Delivery channel for reminder messages (push, email, ...). Implementations
 * report channel-level failures through the result and throw only on
 * unexpected errors.
 */
export interface INotificationSender {
  send(message: IReminderMessage): Promise<IDeliveryResult>;
}
