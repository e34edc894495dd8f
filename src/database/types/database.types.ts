import type { ColumnType, Generated, Insertable, Selectable, Updateable } from 'kysely';

type TimestampColumn = ColumnType<Date, Date | string | undefined, never>;
type UpdatableTimestampColumn = ColumnType<
  Date,
  Date | string | undefined,
  Date | string | undefined
>;
type NullableUpdatableTimestampColumn = ColumnType<
  Date | null,
  Date | string | null | undefined,
  Date | string | null | undefined
>;
type DefaultedColumn<T> = ColumnType<T, T | undefined, T>;

export interface IUsersTable {
  id: Generated<string>;
  email: string;
  timezone: DefaultedColumn<string>;
  created_at: TimestampColumn;
}

export interface INotificationPreferencesTable {
  user_id: string;
  meal_reminders_enabled: DefaultedColumn<boolean>;
  water_reminders_enabled: DefaultedColumn<boolean>;
  sleep_reminders_enabled: DefaultedColumn<boolean>;
  progress_notifications_enabled: DefaultedColumn<boolean>;
  breakfast_time_minutes: DefaultedColumn<number | null>;
  lunch_time_minutes: DefaultedColumn<number | null>;
  dinner_time_minutes: DefaultedColumn<number | null>;
  sleep_reminder_time_minutes: DefaultedColumn<number | null>;
  water_reminder_time_minutes: DefaultedColumn<number | null>;
  daily_summary_time_minutes: DefaultedColumn<number | null>;
  water_reminder_interval_hours: DefaultedColumn<number>;
  last_water_reminder_at: NullableUpdatableTimestampColumn;
  created_at: TimestampColumn;
  updated_at: UpdatableTimestampColumn;
}

export interface INotificationLogsTable {
  id: Generated<string>;
  user_id: string;
  reminder_kind: string;
  status: 'sent' | 'failed';
  failure_reason: string | null;
  created_at: TimestampColumn;
}

export interface IDatabase {
  users: IUsersTable;
  notification_preferences: INotificationPreferencesTable;
  notification_logs: INotificationLogsTable;
}

export type UserRow = Selectable<IUsersTable>;
export type NewUserRow = Insertable<IUsersTable>;

export type NotificationPreferencesRow = Selectable<INotificationPreferencesTable>;
export type NewNotificationPreferencesRow = Insertable<INotificationPreferencesTable>;
export type NotificationPreferencesUpdate = Updateable<INotificationPreferencesTable>;

export type NotificationLogRow = Selectable<INotificationLogsTable>;
export type NewNotificationLogRow = Insertable<INotificationLogsTable>;
