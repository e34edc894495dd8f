export const MINUTES_PER_HOUR = 60;
export const MINUTES_PER_DAY = 1440;
export const MAX_MINUTE_OF_DAY = MINUTES_PER_DAY - 1;

// Quiet window used by interval water reminders: sleep time until breakfast time.
export const DEFAULT_SLEEP_TIME_MINUTES = 1320;
export const DEFAULT_WAKE_TIME_MINUTES = 480;

export const DEFAULT_WATER_REMINDER_TIME_MINUTES = 960;
export const DEFAULT_WATER_REMINDER_INTERVAL_HOURS = 2;
export const DEFAULT_DAILY_SUMMARY_TIME_MINUTES = 1260;

export const NOTIFICATION_PREFERENCE_DEFAULTS = {
  mealRemindersEnabled: true,
  waterRemindersEnabled: true,
  sleepRemindersEnabled: true,
  progressNotificationsEnabled: true,
  breakfastTimeMinutes: 480,
  lunchTimeMinutes: 720,
  dinnerTimeMinutes: 1080,
  sleepReminderTimeMinutes: DEFAULT_SLEEP_TIME_MINUTES,
  waterReminderTimeMinutes: DEFAULT_WATER_REMINDER_TIME_MINUTES,
  waterReminderIntervalHours: DEFAULT_WATER_REMINDER_INTERVAL_HOURS,
  dailySummaryTimeMinutes: DEFAULT_DAILY_SUMMARY_TIME_MINUTES,
} as const;
