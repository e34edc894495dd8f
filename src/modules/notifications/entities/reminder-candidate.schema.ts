import { z } from 'zod';

import { MAX_MINUTE_OF_DAY } from './notification-preferences.constants';

const minuteOfDaySchema = z
  .number()
  .int()
  .min(0)
  .max(MAX_MINUTE_OF_DAY)
  .nullish()
  .transform((value: number | null | undefined): number | null => value ?? null);

const intervalHoursSchema = z
  .number()
  .nullish()
  .transform((value: number | null | undefined): number | null => value ?? null);

// Timestamps must carry an explicit offset when they arrive as strings.
const instantSchema = z
  .union([z.date(), z.iso.datetime({ offset: true })])
  .nullish()
  .transform((value: Date | string | null | undefined): Date | null => {
    if (value === null || value === undefined) {
      return null;
    }

    return typeof value === 'string' ? new Date(value) : value;
  });

export const notificationPreferenceSnapshotSchema = z.object({
  mealRemindersEnabled: z.boolean(),
  waterRemindersEnabled: z.boolean(),
  sleepRemindersEnabled: z.boolean(),
  progressNotificationsEnabled: z.boolean().default(true),
  breakfastTimeMinutes: minuteOfDaySchema,
  lunchTimeMinutes: minuteOfDaySchema,
  dinnerTimeMinutes: minuteOfDaySchema,
  sleepReminderTimeMinutes: minuteOfDaySchema,
  waterReminderTimeMinutes: minuteOfDaySchema,
  waterReminderIntervalHours: intervalHoursSchema,
  lastWaterReminderAt: instantSchema,
  dailySummaryTimeMinutes: minuteOfDaySchema,
});

export const reminderCandidateSchema = z.object({
  userId: z.string().trim().min(1),
  timezone: z
    .string()
    .nullish()
    .transform((value: string | null | undefined): string | null => value ?? null),
  preferences: notificationPreferenceSnapshotSchema,
});
