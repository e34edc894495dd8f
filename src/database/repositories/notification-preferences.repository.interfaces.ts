import type { INotificationPreferenceSnapshot } from '../../modules/notifications/entities/reminder.interfaces';

export interface INotificationPreferencesPatch {
  readonly mealRemindersEnabled?: boolean;
  readonly waterRemindersEnabled?: boolean;
  readonly sleepRemindersEnabled?: boolean;
  readonly progressNotificationsEnabled?: boolean;
  readonly breakfastTimeMinutes?: number | null;
  readonly lunchTimeMinutes?: number | null;
  readonly dinnerTimeMinutes?: number | null;
  readonly sleepReminderTimeMinutes?: number | null;
  readonly waterReminderTimeMinutes?: number | null;
  readonly dailySummaryTimeMinutes?: number | null;
  readonly waterReminderIntervalHours?: number;
}

export interface IReminderCandidateRow {
  readonly userId: string;
  readonly timezone: string;
  readonly preferences: INotificationPreferenceSnapshot;
}
