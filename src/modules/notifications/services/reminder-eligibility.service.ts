import { Injectable } from '@nestjs/common';

import { QuietHoursService } from './quiet-hours.service';
import { hoursBetween, utcToLocalMinutes } from './timezone.util';
import {
  DEFAULT_DAILY_SUMMARY_TIME_MINUTES,
  DEFAULT_WATER_REMINDER_INTERVAL_HOURS,
  DEFAULT_WATER_REMINDER_TIME_MINUTES,
} from '../entities/notification-preferences.constants';
import {
  MEAL_TYPE_BY_REMINDER_KIND,
  MealType,
  ReminderKind,
  WaterReminderStrategy,
  type INotificationPreferenceSnapshot,
} from '../entities/reminder.interfaces';

/**
 * Per-kind reminder decisions for one user at one UTC instant. Meal, sleep,
 * fixed-time water and daily summary reminders match the exact local minute,
 * so the scheduler has to tick at least once per minute.
 */
@Injectable()
export class ReminderEligibilityService {
  public constructor(private readonly quietHoursService: QuietHoursService) {}

  public isDue(
    kind: ReminderKind,
    now: Date,
    snapshot: INotificationPreferenceSnapshot,
    timezone: string | null,
    waterStrategy: WaterReminderStrategy,
  ): boolean {
    const mealType: MealType | undefined = MEAL_TYPE_BY_REMINDER_KIND[kind];

    if (mealType !== undefined) {
      return this.mealReminderDue(now, snapshot, timezone, mealType);
    }

    if (kind === ReminderKind.SLEEP) {
      return this.sleepReminderDue(now, snapshot, timezone);
    }

    if (kind === ReminderKind.WATER) {
      return this.waterReminderDue(now, snapshot, timezone, waterStrategy);
    }

    return this.dailySummaryDue(now, snapshot, timezone);
  }

  public mealReminderDue(
    now: Date,
    snapshot: INotificationPreferenceSnapshot,
    timezone: string | null,
    mealType: MealType,
  ): boolean {
    if (!snapshot.mealRemindersEnabled) {
      return false;
    }

    const targetMinutes: number | null = this.resolveMealTime(snapshot, mealType);

    if (targetMinutes === null) {
      return false;
    }

    return utcToLocalMinutes(now, timezone) === targetMinutes;
  }

  public sleepReminderDue(
    now: Date,
    snapshot: INotificationPreferenceSnapshot,
    timezone: string | null,
  ): boolean {
    if (!snapshot.sleepRemindersEnabled || snapshot.sleepReminderTimeMinutes === null) {
      return false;
    }

    return utcToLocalMinutes(now, timezone) === snapshot.sleepReminderTimeMinutes;
  }

  public waterReminderDue(
    now: Date,
    snapshot: INotificationPreferenceSnapshot,
    timezone: string | null,
    strategy: WaterReminderStrategy,
  ): boolean {
    if (!snapshot.waterRemindersEnabled) {
      return false;
    }

    if (strategy === WaterReminderStrategy.INTERVAL) {
      return this.intervalWaterReminderDue(now, snapshot, timezone);
    }

    const targetMinutes: number =
      snapshot.waterReminderTimeMinutes ?? DEFAULT_WATER_REMINDER_TIME_MINUTES;

    return utcToLocalMinutes(now, timezone) === targetMinutes;
  }

  public dailySummaryDue(
    now: Date,
    snapshot: INotificationPreferenceSnapshot,
    timezone: string | null,
  ): boolean {
    if (!snapshot.progressNotificationsEnabled) {
      return false;
    }

    const targetMinutes: number =
      snapshot.dailySummaryTimeMinutes ?? DEFAULT_DAILY_SUMMARY_TIME_MINUTES;

    return utcToLocalMinutes(now, timezone) === targetMinutes;
  }

  private intervalWaterReminderDue(
    now: Date,
    snapshot: INotificationPreferenceSnapshot,
    timezone: string | null,
  ): boolean {
    const localMinutes: number = utcToLocalMinutes(now, timezone);

    if (
      this.quietHoursService.isInQuietHours(
        localMinutes,
        snapshot.sleepReminderTimeMinutes,
        snapshot.breakfastTimeMinutes,
      )
    ) {
      return false;
    }

    if (snapshot.lastWaterReminderAt === null) {
      return true;
    }

    return (
      hoursBetween(now, snapshot.lastWaterReminderAt) >=
      this.resolveIntervalHours(snapshot.waterReminderIntervalHours)
    );
  }

  private resolveIntervalHours(intervalHours: number | null): number {
    if (intervalHours === null || !Number.isFinite(intervalHours) || intervalHours <= 0) {
      return DEFAULT_WATER_REMINDER_INTERVAL_HOURS;
    }

    return intervalHours;
  }

  private resolveMealTime(
    snapshot: INotificationPreferenceSnapshot,
    mealType: MealType,
  ): number | null {
    if (mealType === MealType.BREAKFAST) {
      return snapshot.breakfastTimeMinutes;
    }

    if (mealType === MealType.LUNCH) {
      return snapshot.lunchTimeMinutes;
    }

    if (mealType === MealType.DINNER) {
      return snapshot.dinnerTimeMinutes;
    }

    return null;
  }
}
