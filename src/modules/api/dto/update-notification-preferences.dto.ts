import { z } from 'zod';

import { MAX_MINUTE_OF_DAY } from '../../notifications/entities/notification-preferences.constants';

const minuteOfDaySchema = z.number().int().min(0).max(MAX_MINUTE_OF_DAY).nullable().optional();

export const updateNotificationPreferencesSchema = z
  .strictObject({
    mealRemindersEnabled: z.boolean().optional(),
    waterRemindersEnabled: z.boolean().optional(),
    sleepRemindersEnabled: z.boolean().optional(),
    progressNotificationsEnabled: z.boolean().optional(),
    breakfastTimeMinutes: minuteOfDaySchema,
    lunchTimeMinutes: minuteOfDaySchema,
    dinnerTimeMinutes: minuteOfDaySchema,
    sleepReminderTimeMinutes: minuteOfDaySchema,
    waterReminderTimeMinutes: minuteOfDaySchema,
    dailySummaryTimeMinutes: minuteOfDaySchema,
    waterReminderIntervalHours: z.number().int().positive().optional(),
    timezone: z.string().trim().min(1).optional(),
  })
  .refine((obj) => Object.values(obj).some((v) => v !== undefined), {
    message: 'At least one preference field must be provided',
  });

export type UpdateNotificationPreferencesDto = z.infer<typeof updateNotificationPreferencesSchema>;
