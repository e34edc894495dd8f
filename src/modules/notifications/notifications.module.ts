import { Module } from '@nestjs/common';

import { MinuteReminderSchedulerService } from './scheduler/minute-reminder-scheduler.service';
import { REMINDER_SCHEDULER } from './scheduler/reminder-scheduler-port.tokens';
import { LoggingNotificationSender } from './senders/logging-notification-sender';
import { NotificationHistoryService } from './services/notification-history.service';
import { NotificationPreferencesService } from './services/notification-preferences.service';
import { QuietHoursService } from './services/quiet-hours.service';
import { ReminderBatchEvaluatorService } from './services/reminder-batch-evaluator.service';
import { ReminderDispatcherService } from './services/reminder-dispatcher.service';
import { ReminderEligibilityService } from './services/reminder-eligibility.service';
import { ReminderMessageFormatter } from './services/reminder-message.formatter';
import { ReminderTickDependencies, ReminderTickService } from './services/reminder-tick.service';
import { TestNotificationService } from './services/test-notification.service';
import { NOTIFICATION_SENDER } from '../../common/interfaces/notifications/notification-sender-port.tokens';
import { DatabaseModule } from '../../database/database.module';
import { ObservabilityModule } from '../observability/observability.module';

@Module({
  imports: [DatabaseModule, ObservabilityModule],
  providers: [
    // --- Matching core ---
    QuietHoursService,
    ReminderEligibilityService,
    ReminderBatchEvaluatorService,
    // --- Dispatch ---
    ReminderMessageFormatter,
    LoggingNotificationSender,
    { provide: NOTIFICATION_SENDER, useExisting: LoggingNotificationSender },
    ReminderDispatcherService,
    // --- Scheduling ---
    ReminderTickDependencies,
    ReminderTickService,
    MinuteReminderSchedulerService,
    { provide: REMINDER_SCHEDULER, useExisting: MinuteReminderSchedulerService },
    // --- Preferences & history ---
    NotificationPreferencesService,
    NotificationHistoryService,
    TestNotificationService,
  ],
  exports: [
    ReminderBatchEvaluatorService,
    ReminderTickService,
    NotificationPreferencesService,
    NotificationHistoryService,
    TestNotificationService,
    REMINDER_SCHEDULER,
  ],
})
export class NotificationsModule {}
