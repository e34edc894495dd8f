export enum WaterReminderStrategy {
  FIXED_TIME = 'fixed_time',
  INTERVAL = 'interval',
}

export enum MealType {
  BREAKFAST = 'breakfast',
  LUNCH = 'lunch',
  DINNER = 'dinner',
}

export enum ReminderKind {
  MEAL_BREAKFAST = 'meal_reminder_breakfast',
  MEAL_LUNCH = 'meal_reminder_lunch',
  MEAL_DINNER = 'meal_reminder_dinner',
  SLEEP = 'sleep_reminder',
  WATER = 'water_reminder',
  DAILY_SUMMARY = 'daily_summary',
}

export const REMINDER_KINDS: readonly ReminderKind[] = [
  ReminderKind.MEAL_BREAKFAST,
  ReminderKind.MEAL_LUNCH,
  ReminderKind.MEAL_DINNER,
  ReminderKind.SLEEP,
  ReminderKind.WATER,
  ReminderKind.DAILY_SUMMARY,
];

export type TestNotificationKind = 'test_notification';

export const TEST_NOTIFICATION_KIND: TestNotificationKind = 'test_notification';

/** Everything the delivery log records: scheduled reminders plus manual test sends. */
export type NotificationKind = ReminderKind | TestNotificationKind;

export const MEAL_TYPE_BY_REMINDER_KIND: Readonly<Partial<Record<ReminderKind, MealType>>> = {
  [ReminderKind.MEAL_BREAKFAST]: MealType.BREAKFAST,
  [ReminderKind.MEAL_LUNCH]: MealType.LUNCH,
  [ReminderKind.MEAL_DINNER]: MealType.DINNER,
};

/**
 * Read-only view of one user's stored reminder preferences. Every `*TimeMinutes`
 * value is minutes since local midnight in `[0, 1439]`.
 */
export interface INotificationPreferenceSnapshot {
  readonly mealRemindersEnabled: boolean;
  readonly waterRemindersEnabled: boolean;
  readonly sleepRemindersEnabled: boolean;
  readonly progressNotificationsEnabled: boolean;
  readonly breakfastTimeMinutes: number | null;
  readonly lunchTimeMinutes: number | null;
  readonly dinnerTimeMinutes: number | null;
  readonly sleepReminderTimeMinutes: number | null;
  readonly waterReminderTimeMinutes: number | null;
  readonly waterReminderIntervalHours: number | null;
  readonly lastWaterReminderAt: Date | null;
  readonly dailySummaryTimeMinutes: number | null;
}

export interface IReminderCandidate {
  readonly userId: string;
  readonly timezone: string | null;
  readonly preferences: INotificationPreferenceSnapshot;
}

export interface ISkippedCandidate {
  readonly index: number;
  readonly userId: string | null;
  readonly reason: string;
}

export type ReminderDueMap = Readonly<Record<ReminderKind, readonly string[]>>;

export interface IReminderBatchResult {
  readonly evaluatedAt: Date;
  readonly dueByKind: ReminderDueMap;
  readonly skipped: readonly ISkippedCandidate[];
}
