import type { NotificationKind } from './reminder.interfaces';
import type { NotificationDeliveryStatus } from '../../../database/repositories/notification-logs.repository.interfaces';

export interface INotificationHistoryQuery {
  readonly kind?: NotificationKind | undefined;
  readonly limit: number;
  readonly offset: number;
}

export interface INotificationHistoryEntryView {
  readonly id: string;
  readonly kind: string;
  readonly status: NotificationDeliveryStatus;
  readonly failureReason: string | null;
  readonly createdAt: string;
}

export interface INotificationHistoryView {
  readonly userId: string;
  readonly entries: readonly INotificationHistoryEntryView[];
  readonly total: number;
  readonly limit: number;
  readonly offset: number;
}

export interface ITestNotificationResult {
  readonly userId: string;
  readonly delivered: boolean;
  readonly failureReason: string | null;
  readonly sentAt: string;
}
