import { z } from 'zod';

import {
  ReminderKind,
  TEST_NOTIFICATION_KIND,
} from '../../notifications/entities/reminder.interfaces';

export const DEFAULT_HISTORY_LIMIT: number = 50;
export const MAX_HISTORY_LIMIT: number = 100;

export const notificationHistoryQuerySchema = z.strictObject({
  kind: z.union([z.enum(ReminderKind), z.literal(TEST_NOTIFICATION_KIND)]).optional(),
  limit: z.coerce.number().int().min(1).max(MAX_HISTORY_LIMIT).default(DEFAULT_HISTORY_LIMIT),
  offset: z.coerce.number().int().min(0).default(0),
});

export type NotificationHistoryQueryDto = z.infer<typeof notificationHistoryQuerySchema>;
