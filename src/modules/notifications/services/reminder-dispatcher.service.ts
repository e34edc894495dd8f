import { Inject, Injectable, Logger } from '@nestjs/common';

import { ReminderMessageFormatter } from './reminder-message.formatter';
import { NOTIFICATION_SENDER } from '../../../common/interfaces/notifications/notification-sender-port.tokens';
import type {
  IDeliveryResult,
  INotificationSender,
  IReminderMessage,
} from '../../../common/interfaces/notifications/notification-sender.interfaces';
import { NotificationLogsRepository } from '../../../database/repositories/notification-logs.repository';
import type { NotificationDeliveryStatus } from '../../../database/repositories/notification-logs.repository.interfaces';
import { NotificationPreferencesRepository } from '../../../database/repositories/notification-preferences.repository';
import { MetricsService } from '../../observability/metrics.service';
import type { IReminderDispatchSummary } from '../entities/reminder-dispatch.interfaces';
import {
  REMINDER_KINDS,
  ReminderKind,
  type IReminderBatchResult,
  type NotificationKind,
} from '../entities/reminder.interfaces';

@Injectable()
export class ReminderDispatcherService {
  private readonly logger: Logger = new Logger(ReminderDispatcherService.name);

  public constructor(
    private readonly reminderMessageFormatter: ReminderMessageFormatter,
    @Inject(NOTIFICATION_SENDER)
    private readonly notificationSender: INotificationSender,
    private readonly notificationLogsRepository: NotificationLogsRepository,
    private readonly notificationPreferencesRepository: NotificationPreferencesRepository,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * Sends every due reminder in the batch one by one. A failed delivery is
   * logged and counted; it never stops the remaining sends.
   */
  public async dispatch(
    result: IReminderBatchResult,
    sentAt: Date,
  ): Promise<IReminderDispatchSummary> {
    let attempted: number = 0;
    let sent: number = 0;

    for (const kind of REMINDER_KINDS) {
      const userIds: readonly string[] = result.dueByKind[kind];

      for (const userId of userIds) {
        attempted += 1;
        const delivered: boolean = await this.deliver(kind, userId, sentAt);

        if (delivered) {
          sent += 1;
        }
      }
    }

    if (attempted > 0) {
      this.logger.log(
        `dispatch_complete attempted=${String(attempted)} sent=${String(sent)} failed=${String(attempted - sent)}`,
      );
    }

    return { attempted, sent, failed: attempted - sent };
  }

  /**
   * Sends one message, counts it and writes its delivery log row. Used for
   * scheduled reminders and for manual test sends alike.
   */
  public async deliverMessage(message: IReminderMessage, sentAt: Date): Promise<IDeliveryResult> {
    const deliveryResult: IDeliveryResult = await this.send(message);
    const status: NotificationDeliveryStatus = deliveryResult.delivered ? 'sent' : 'failed';

    this.metricsService.reminderDeliveriesTotal.inc({ kind: message.kind, status });

    if (!deliveryResult.delivered) {
      this.logger.warn(
        `reminder_delivery_failed userId=${message.userId} kind=${message.kind} reason=${deliveryResult.failureReason ?? 'n/a'}`,
      );
    }

    await this.recordDelivery(
      message.kind,
      message.userId,
      status,
      deliveryResult.failureReason,
      sentAt,
    );

    return deliveryResult;
  }

  private async deliver(kind: ReminderKind, userId: string, sentAt: Date): Promise<boolean> {
    const message: IReminderMessage = this.reminderMessageFormatter.format(kind, userId);
    const deliveryResult: IDeliveryResult = await this.deliverMessage(message, sentAt);

    if (deliveryResult.delivered && kind === ReminderKind.WATER) {
      await this.markWaterReminderSent(userId, sentAt);
    }

    return deliveryResult.delivered;
  }

  private async send(message: IReminderMessage): Promise<IDeliveryResult> {
    try {
      return await this.notificationSender.send(message);
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      return { delivered: false, failureReason: errorMessage };
    }
  }

  private async recordDelivery(
    kind: NotificationKind,
    userId: string,
    status: NotificationDeliveryStatus,
    failureReason: string | null,
    createdAt: Date,
  ): Promise<void> {
    try {
      await this.notificationLogsRepository.recordDelivery({
        userId,
        kind,
        status,
        failureReason,
        createdAt,
      });
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `notification_log_write_failed userId=${userId} kind=${kind} reason=${errorMessage}`,
      );
    }
  }

  private async markWaterReminderSent(userId: string, sentAt: Date): Promise<void> {
    try {
      const updated: boolean = await this.notificationPreferencesRepository.updateLastWaterReminder(
        userId,
        sentAt,
      );

      if (!updated) {
        this.logger.warn(`last_water_reminder_not_updated userId=${userId} reason=no_preferences_row`);
      }
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(`last_water_reminder_update_failed userId=${userId} reason=${errorMessage}`);
    }
  }
}
