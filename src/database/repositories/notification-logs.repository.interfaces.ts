import type { NotificationKind } from '../../modules/notifications/entities/reminder.interfaces';

export type NotificationDeliveryStatus = 'sent' | 'failed';

export interface IRecordDeliveryInput {
  readonly userId: string;
  readonly kind: NotificationKind;
  readonly status: NotificationDeliveryStatus;
  readonly failureReason: string | null;
  readonly createdAt: Date;
}

export interface IListDeliveriesOptions {
  readonly kind?: NotificationKind | undefined;
  readonly limit: number;
  readonly offset: number;
}

export interface INotificationLogEntry {
  readonly id: string;
  readonly kind: string;
  readonly status: NotificationDeliveryStatus;
  readonly failureReason: string | null;
  readonly createdAt: Date;
}

export interface INotificationLogPage {
  readonly entries: readonly INotificationLogEntry[];
  readonly total: number;
}
