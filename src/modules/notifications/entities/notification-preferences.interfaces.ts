import type { INotificationPreferencesPatch } from '../../../database/repositories/notification-preferences.repository.interfaces';

export interface INotificationPreferencesView {
  readonly userId: string;
  readonly timezone: string;
  readonly mealRemindersEnabled: boolean;
  readonly waterRemindersEnabled: boolean;
  readonly sleepRemindersEnabled: boolean;
  readonly progressNotificationsEnabled: boolean;
  readonly breakfastTimeMinutes: number | null;
  readonly lunchTimeMinutes: number | null;
  readonly dinnerTimeMinutes: number | null;
  readonly sleepReminderTimeMinutes: number | null;
  readonly waterReminderTimeMinutes: number | null;
  readonly dailySummaryTimeMinutes: number | null;
  readonly waterReminderIntervalHours: number;
  readonly lastWaterReminderAt: string | null;
  readonly updatedAt: string;
}

export interface IUpdateNotificationPreferencesInput extends INotificationPreferencesPatch {
  readonly timezone?: string;
}
