import { Injectable } from '@nestjs/common';

import type { IReminderMessage } from '../../../common/interfaces/notifications/notification-sender.interfaces';
import {
  MEAL_TYPE_BY_REMINDER_KIND,
  ReminderKind,
  TEST_NOTIFICATION_KIND,
  type MealType,
} from '../entities/reminder.interfaces';

interface IReminderCopy {
  readonly title: string;
  readonly body: string;
}

const REMINDER_COPY: Readonly<Record<ReminderKind, IReminderCopy>> = {
  [ReminderKind.MEAL_BREAKFAST]: {
    title: '🍳 Breakfast Time!',
    body: 'Start your day right - log your breakfast',
  },
  [ReminderKind.MEAL_LUNCH]: {
    title: '🥗 Lunch Time!',
    body: 'Time for a nutritious lunch break',
  },
  [ReminderKind.MEAL_DINNER]: {
    title: '🍽️ Dinner Time!',
    body: 'Wind down with a healthy dinner',
  },
  [ReminderKind.WATER]: {
    title: '💧 Hydration Check',
    body: 'Time to drink some water!',
  },
  [ReminderKind.SLEEP]: {
    title: '😴 Sleep Time',
    body: "Get ready for a good night's rest",
  },
  [ReminderKind.DAILY_SUMMARY]: {
    title: '📊 Your Daily Summary',
    body: "See how today's meals add up",
  },
};

const TEST_NOTIFICATION_COPY: IReminderCopy = {
  title: '🧪 Test Notification',
  body: 'This is a test notification from the backend',
};

@Injectable()
export class ReminderMessageFormatter {
  public format(kind: ReminderKind, userId: string): IReminderMessage {
    const copy: IReminderCopy = REMINDER_COPY[kind];
    const mealType: MealType | undefined = MEAL_TYPE_BY_REMINDER_KIND[kind];
    const data: Record<string, string> =
      mealType !== undefined ? { type: kind, meal_type: mealType } : { type: kind };

    return {
      userId,
      kind,
      title: copy.title,
      body: copy.body,
      data,
    };
  }

  public formatTest(userId: string, sentAt: Date): IReminderMessage {
    return {
      userId,
      kind: TEST_NOTIFICATION_KIND,
      title: TEST_NOTIFICATION_COPY.title,
      body: TEST_NOTIFICATION_COPY.body,
      data: { type: 'test', timestamp: sentAt.toISOString() },
    };
  }
}
