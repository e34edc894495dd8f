import { describe, expect, it, vi } from 'vitest';

import { NotificationPreferencesRepository } from './notification-preferences.repository';
import type { IReminderCandidateRow } from './notification-preferences.repository.interfaces';
import type { DatabaseService } from '../kysely/database.service';
import type { NotificationPreferencesRow } from '../types/database.types';

type DatabaseServiceStub = {
  readonly getDb: ReturnType<typeof vi.fn>;
};

const createRepository = (db: unknown): NotificationPreferencesRepository => {
  const databaseServiceStub: DatabaseServiceStub = {
    getDb: vi.fn().mockReturnValue(db),
  };

  return new NotificationPreferencesRepository(
    databaseServiceStub as unknown as DatabaseService,
  );
};

const createPreferencesRow = (): NotificationPreferencesRow => ({
  user_id: 'user-1',
  meal_reminders_enabled: true,
  water_reminders_enabled: true,
  sleep_reminders_enabled: true,
  progress_notifications_enabled: true,
  breakfast_time_minutes: 480,
  lunch_time_minutes: 720,
  dinner_time_minutes: 1080,
  sleep_reminder_time_minutes: 1320,
  water_reminder_time_minutes: 960,
  daily_summary_time_minutes: 1260,
  water_reminder_interval_hours: 2,
  last_water_reminder_at: null,
  created_at: new Date('2024-01-01T00:00:00Z'),
  updated_at: new Date('2024-01-01T00:00:00Z'),
});

describe('NotificationPreferencesRepository', (): void => {
  it('inserts default preferences for a new user', async (): Promise<void> => {
    const row: NotificationPreferencesRow = createPreferencesRow();
    const executeTakeFirst = vi.fn().mockResolvedValue(row);
    const returningAll = vi.fn().mockReturnValue({ executeTakeFirst });
    const onConflict = vi.fn().mockReturnValue({ returningAll });
    const values = vi.fn().mockReturnValue({ onConflict });
    const insertInto = vi.fn().mockReturnValue({ values });
    const repository: NotificationPreferencesRepository = createRepository({ insertInto });

    const result: NotificationPreferencesRow = await repository.findOrCreateByUserId('user-1');

    expect(insertInto).toHaveBeenCalledWith('notification_preferences');
    expect(values).toHaveBeenCalledWith({
      user_id: 'user-1',
      meal_reminders_enabled: true,
      water_reminders_enabled: true,
      sleep_reminders_enabled: true,
      progress_notifications_enabled: true,
      breakfast_time_minutes: 480,
      lunch_time_minutes: 720,
      dinner_time_minutes: 1080,
      sleep_reminder_time_minutes: 1320,
      water_reminder_time_minutes: 960,
      daily_summary_time_minutes: 1260,
      water_reminder_interval_hours: 2,
    });
    expect(result).toBe(row);
  });

  it('falls back to the existing row when the insert conflicts', async (): Promise<void> => {
    const row: NotificationPreferencesRow = createPreferencesRow();
    const insertExecuteTakeFirst = vi.fn().mockResolvedValue(undefined);
    const returningAll = vi.fn().mockReturnValue({ executeTakeFirst: insertExecuteTakeFirst });
    const onConflict = vi.fn().mockReturnValue({ returningAll });
    const values = vi.fn().mockReturnValue({ onConflict });
    const insertInto = vi.fn().mockReturnValue({ values });
    const selectExecuteTakeFirst = vi.fn().mockResolvedValue(row);
    const where = vi.fn().mockReturnValue({ executeTakeFirst: selectExecuteTakeFirst });
    const selectAll = vi.fn().mockReturnValue({ where });
    const selectFrom = vi.fn().mockReturnValue({ selectAll });
    const repository: NotificationPreferencesRepository = createRepository({
      insertInto,
      selectFrom,
    });

    const result: NotificationPreferencesRow = await repository.findOrCreateByUserId('user-1');

    expect(where).toHaveBeenCalledWith('user_id', '=', 'user-1');
    expect(result).toBe(row);
  });

  it('returns true when the last water reminder timestamp was updated', async (): Promise<void> => {
    const sentAt: Date = new Date('2024-01-15T12:00:00Z');
    const executeTakeFirst = vi.fn().mockResolvedValue({ numUpdatedRows: 1n });
    const where = vi.fn().mockReturnValue({ executeTakeFirst });
    const set = vi.fn().mockReturnValue({ where });
    const updateTable = vi.fn().mockReturnValue({ set });
    const repository: NotificationPreferencesRepository = createRepository({ updateTable });

    const updated: boolean = await repository.updateLastWaterReminder('user-1', sentAt);

    expect(updateTable).toHaveBeenCalledWith('notification_preferences');
    expect(set).toHaveBeenCalledWith({ last_water_reminder_at: sentAt });
    expect(where).toHaveBeenCalledWith('user_id', '=', 'user-1');
    expect(updated).toBe(true);
  });

  it('returns false when no preferences row exists for the water update', async (): Promise<void> => {
    const executeTakeFirst = vi.fn().mockResolvedValue({ numUpdatedRows: 0n });
    const where = vi.fn().mockReturnValue({ executeTakeFirst });
    const set = vi.fn().mockReturnValue({ where });
    const updateTable = vi.fn().mockReturnValue({ set });
    const repository: NotificationPreferencesRepository = createRepository({ updateTable });

    const updated: boolean = await repository.updateLastWaterReminder('user-9', new Date());

    expect(updated).toBe(false);
  });

  it('maps camel case patches to columns and stamps updated_at', async (): Promise<void> => {
    const row: NotificationPreferencesRow = createPreferencesRow();
    const executeTakeFirst = vi.fn().mockResolvedValue(row);
    const returningAll = vi.fn().mockReturnValue({ executeTakeFirst });
    const where = vi.fn().mockReturnValue({ returningAll });
    const set = vi.fn().mockReturnValue({ where });
    const updateTable = vi.fn().mockReturnValue({ set });
    const repository: NotificationPreferencesRepository = createRepository({ updateTable });

    const result: NotificationPreferencesRow | null = await repository.updateByUserId('user-1', {
      lunchTimeMinutes: 750,
      waterRemindersEnabled: false,
    });

    expect(set).toHaveBeenCalledWith(
      expect.objectContaining({
        lunch_time_minutes: 750,
        water_reminders_enabled: false,
        breakfast_time_minutes: undefined,
        updated_at: expect.any(Date),
      }),
    );
    expect(result).toBe(row);
  });

  it('maps joined candidate rows to camel case snapshots', async (): Promise<void> => {
    const lastWaterReminderAt: Date = new Date('2024-01-15T10:00:00Z');
    const execute = vi.fn().mockResolvedValue([
      {
        user_id: 'user-1',
        timezone: 'Asia/Ho_Chi_Minh',
        meal_reminders_enabled: true,
        water_reminders_enabled: false,
        sleep_reminders_enabled: true,
        progress_notifications_enabled: false,
        breakfast_time_minutes: 540,
        lunch_time_minutes: null,
        dinner_time_minutes: 1080,
        sleep_reminder_time_minutes: 1320,
        water_reminder_time_minutes: null,
        daily_summary_time_minutes: 1260,
        water_reminder_interval_hours: 3,
        last_water_reminder_at: lastWaterReminderAt,
      },
    ]);
    const orderBy = vi.fn().mockReturnValue({ execute });
    const where = vi.fn().mockReturnValue({ orderBy });
    const select = vi.fn().mockReturnValue({ where });
    const innerJoin = vi.fn().mockReturnValue({ select });
    const selectFrom = vi.fn().mockReturnValue({ innerJoin });
    const repository: NotificationPreferencesRepository = createRepository({ selectFrom });

    const candidates: readonly IReminderCandidateRow[] = await repository.listReminderCandidates();

    expect(selectFrom).toHaveBeenCalledWith('notification_preferences as np');
    expect(innerJoin).toHaveBeenCalledWith('users as u', 'u.id', 'np.user_id');
    expect(candidates).toEqual([
      {
        userId: 'user-1',
        timezone: 'Asia/Ho_Chi_Minh',
        preferences: {
          mealRemindersEnabled: true,
          waterRemindersEnabled: false,
          sleepRemindersEnabled: true,
          progressNotificationsEnabled: false,
          breakfastTimeMinutes: 540,
          lunchTimeMinutes: null,
          dinnerTimeMinutes: 1080,
          sleepReminderTimeMinutes: 1320,
          waterReminderTimeMinutes: null,
          waterReminderIntervalHours: 3,
          lastWaterReminderAt,
          dailySummaryTimeMinutes: 1260,
        },
      },
    ]);
  });
});
