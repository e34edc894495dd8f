import { Injectable } from '@nestjs/common';

import type {
  INotificationPreferencesPatch,
  IReminderCandidateRow,
} from './notification-preferences.repository.interfaces';
import { NOTIFICATION_PREFERENCE_DEFAULTS } from '../../modules/notifications/entities/notification-preferences.constants';
import { DatabaseService } from '../kysely/database.service';
import type {
  NewNotificationPreferencesRow,
  NotificationPreferencesRow,
  NotificationPreferencesUpdate,
} from '../types/database.types';

type ReminderCandidateQueryRow = {
  readonly user_id: string;
  readonly timezone: string;
  readonly meal_reminders_enabled: boolean;
  readonly water_reminders_enabled: boolean;
  readonly sleep_reminders_enabled: boolean;
  readonly progress_notifications_enabled: boolean;
  readonly breakfast_time_minutes: number | null;
  readonly lunch_time_minutes: number | null;
  readonly dinner_time_minutes: number | null;
  readonly sleep_reminder_time_minutes: number | null;
  readonly water_reminder_time_minutes: number | null;
  readonly daily_summary_time_minutes: number | null;
  readonly water_reminder_interval_hours: number;
  readonly last_water_reminder_at: Date | null;
};

@Injectable()
export class NotificationPreferencesRepository {
  public constructor(private readonly databaseService: DatabaseService) {}

  public async findByUserId(userId: string): Promise<NotificationPreferencesRow | null> {
    const row: NotificationPreferencesRow | undefined = await this.databaseService
      .getDb()
      .selectFrom('notification_preferences')
      .selectAll()
      .where('user_id', '=', userId)
      .executeTakeFirst();

    return row ?? null;
  }

  public async findOrCreateByUserId(userId: string): Promise<NotificationPreferencesRow> {
    const insertRow: NewNotificationPreferencesRow = {
      user_id: userId,
      meal_reminders_enabled: NOTIFICATION_PREFERENCE_DEFAULTS.mealRemindersEnabled,
      water_reminders_enabled: NOTIFICATION_PREFERENCE_DEFAULTS.waterRemindersEnabled,
      sleep_reminders_enabled: NOTIFICATION_PREFERENCE_DEFAULTS.sleepRemindersEnabled,
      progress_notifications_enabled: NOTIFICATION_PREFERENCE_DEFAULTS.progressNotificationsEnabled,
      breakfast_time_minutes: NOTIFICATION_PREFERENCE_DEFAULTS.breakfastTimeMinutes,
      lunch_time_minutes: NOTIFICATION_PREFERENCE_DEFAULTS.lunchTimeMinutes,
      dinner_time_minutes: NOTIFICATION_PREFERENCE_DEFAULTS.dinnerTimeMinutes,
      sleep_reminder_time_minutes: NOTIFICATION_PREFERENCE_DEFAULTS.sleepReminderTimeMinutes,
      water_reminder_time_minutes: NOTIFICATION_PREFERENCE_DEFAULTS.waterReminderTimeMinutes,
      daily_summary_time_minutes: NOTIFICATION_PREFERENCE_DEFAULTS.dailySummaryTimeMinutes,
      water_reminder_interval_hours: NOTIFICATION_PREFERENCE_DEFAULTS.waterReminderIntervalHours,
    };

    const insertedRow: NotificationPreferencesRow | undefined = await this.databaseService
      .getDb()
      .insertInto('notification_preferences')
      .values(insertRow)
      .onConflict((oc) => oc.column('user_id').doNothing())
      .returningAll()
      .executeTakeFirst();

    if (insertedRow) {
      return insertedRow;
    }

    const existingRow: NotificationPreferencesRow | null = await this.findByUserId(userId);

    if (!existingRow) {
      throw new Error(`Notification preferences for user ${userId} were not found after upsert.`);
    }

    return existingRow;
  }

  public async updateByUserId(
    userId: string,
    patch: INotificationPreferencesPatch,
  ): Promise<NotificationPreferencesRow | null> {
    const updateRow: NotificationPreferencesUpdate = {
      ...this.mapPatch(patch),
      updated_at: new Date(),
    };

    const row: NotificationPreferencesRow | undefined = await this.databaseService
      .getDb()
      .updateTable('notification_preferences')
      .set(updateRow)
      .where('user_id', '=', userId)
      .returningAll()
      .executeTakeFirst();

    return row ?? null;
  }

  public async updateLastWaterReminder(userId: string, sentAt: Date): Promise<boolean> {
    const result = await this.databaseService
      .getDb()
      .updateTable('notification_preferences')
      .set({ last_water_reminder_at: sentAt })
      .where('user_id', '=', userId)
      .executeTakeFirst();

    return result.numUpdatedRows > 0n;
  }

  /**
   * Users with at least one reminder channel switched on, joined with their
   * profile timezone.
   */
  public async listReminderCandidates(): Promise<readonly IReminderCandidateRow[]> {
    const rows: readonly ReminderCandidateQueryRow[] = await this.databaseService
      .getDb()
      .selectFrom('notification_preferences as np')
      .innerJoin('users as u', 'u.id', 'np.user_id')
      .select([
        'np.user_id',
        'u.timezone',
        'np.meal_reminders_enabled',
        'np.water_reminders_enabled',
        'np.sleep_reminders_enabled',
        'np.progress_notifications_enabled',
        'np.breakfast_time_minutes',
        'np.lunch_time_minutes',
        'np.dinner_time_minutes',
        'np.sleep_reminder_time_minutes',
        'np.water_reminder_time_minutes',
        'np.daily_summary_time_minutes',
        'np.water_reminder_interval_hours',
        'np.last_water_reminder_at',
      ])
      .where((eb) =>
        eb.or([
          eb('np.meal_reminders_enabled', '=', true),
          eb('np.water_reminders_enabled', '=', true),
          eb('np.sleep_reminders_enabled', '=', true),
          eb('np.progress_notifications_enabled', '=', true),
        ]),
      )
      .orderBy('np.user_id')
      .execute();

    return rows.map((row: ReminderCandidateQueryRow): IReminderCandidateRow => ({
      userId: row.user_id,
      timezone: row.timezone,
      preferences: {
        mealRemindersEnabled: row.meal_reminders_enabled,
        waterRemindersEnabled: row.water_reminders_enabled,
        sleepRemindersEnabled: row.sleep_reminders_enabled,
        progressNotificationsEnabled: row.progress_notifications_enabled,
        breakfastTimeMinutes: row.breakfast_time_minutes,
        lunchTimeMinutes: row.lunch_time_minutes,
        dinnerTimeMinutes: row.dinner_time_minutes,
        sleepReminderTimeMinutes: row.sleep_reminder_time_minutes,
        waterReminderTimeMinutes: row.water_reminder_time_minutes,
        waterReminderIntervalHours: row.water_reminder_interval_hours,
        lastWaterReminderAt: row.last_water_reminder_at,
        dailySummaryTimeMinutes: row.daily_summary_time_minutes,
      },
    }));
  }

  private mapPatch(patch: INotificationPreferencesPatch): NotificationPreferencesUpdate {
    return {
      meal_reminders_enabled: patch.mealRemindersEnabled,
      water_reminders_enabled: patch.waterRemindersEnabled,
      sleep_reminders_enabled: patch.sleepRemindersEnabled,
      progress_notifications_enabled: patch.progressNotificationsEnabled,
      breakfast_time_minutes: patch.breakfastTimeMinutes,
      lunch_time_minutes: patch.lunchTimeMinutes,
      dinner_time_minutes: patch.dinnerTimeMinutes,
      sleep_reminder_time_minutes: patch.sleepReminderTimeMinutes,
      water_reminder_time_minutes: patch.waterReminderTimeMinutes,
      daily_summary_time_minutes: patch.dailySummaryTimeMinutes,
      water_reminder_interval_hours: patch.waterReminderIntervalHours,
    };
  }
}
