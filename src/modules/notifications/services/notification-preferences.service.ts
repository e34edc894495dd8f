import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';

import { isValidTimezone } from './timezone.util';
import type { INotificationPreferencesPatch } from '../../../database/repositories/notification-preferences.repository.interfaces';
import { NotificationPreferencesRepository } from '../../../database/repositories/notification-preferences.repository';
import { UsersRepository } from '../../../database/repositories/users.repository';
import type { NotificationPreferencesRow, UserRow } from '../../../database/types/database.types';
import { MAX_MINUTE_OF_DAY } from '../entities/notification-preferences.constants';
import type {
  INotificationPreferencesView,
  IUpdateNotificationPreferencesInput,
} from '../entities/notification-preferences.interfaces';

type MinuteOfDayField = Extract<
  keyof INotificationPreferencesPatch,
  | 'breakfastTimeMinutes'
  | 'lunchTimeMinutes'
  | 'dinnerTimeMinutes'
  | 'sleepReminderTimeMinutes'
  | 'waterReminderTimeMinutes'
  | 'dailySummaryTimeMinutes'
>;

const MINUTE_OF_DAY_FIELDS: readonly MinuteOfDayField[] = [
  'breakfastTimeMinutes',
  'lunchTimeMinutes',
  'dinnerTimeMinutes',
  'sleepReminderTimeMinutes',
  'waterReminderTimeMinutes',
  'dailySummaryTimeMinutes',
];

@Injectable()
export class NotificationPreferencesService {
  private readonly logger: Logger = new Logger(NotificationPreferencesService.name);

  public constructor(
    private readonly usersRepository: UsersRepository,
    private readonly notificationPreferencesRepository: NotificationPreferencesRepository,
  ) {}

  public async getPreferences(userId: string): Promise<INotificationPreferencesView> {
    const user: UserRow = await this.requireUser(userId);
    const preferences: NotificationPreferencesRow =
      await this.notificationPreferencesRepository.findOrCreateByUserId(userId);

    return this.toView(user, preferences);
  }

  public async updatePreferences(
    userId: string,
    input: IUpdateNotificationPreferencesInput,
  ): Promise<INotificationPreferencesView> {
    this.assertValidInput(input);

    let user: UserRow = await this.requireUser(userId);
    await this.notificationPreferencesRepository.findOrCreateByUserId(userId);

    const { timezone, ...patch } = input;
    const updatedPreferences: NotificationPreferencesRow | null =
      await this.notificationPreferencesRepository.updateByUserId(userId, patch);

    if (updatedPreferences === null) {
      throw new NotFoundException(`Notification preferences for user ${userId} not found`);
    }

    if (timezone !== undefined && timezone !== user.timezone) {
      const updatedUser: UserRow | null = await this.usersRepository.updateTimezone(
        userId,
        timezone,
      );

      if (updatedUser === null) {
        throw new NotFoundException(`User ${userId} not found`);
      }

      user = updatedUser;
    }

    this.logger.log(
      `notification_preferences_updated userId=${userId} fields=${Object.keys(input).join(',')}`,
    );

    return this.toView(user, updatedPreferences);
  }

  private async requireUser(userId: string): Promise<UserRow> {
    const user: UserRow | null = await this.usersRepository.findById(userId);

    if (user === null) {
      throw new NotFoundException(`User ${userId} not found`);
    }

    return user;
  }

  private assertValidInput(input: IUpdateNotificationPreferencesInput): void {
    for (const field of MINUTE_OF_DAY_FIELDS) {
      const value: number | null | undefined = input[field];

      if (
        value !== undefined &&
        value !== null &&
        (!Number.isInteger(value) || value < 0 || value > MAX_MINUTE_OF_DAY)
      ) {
        throw new BadRequestException(
          `${field} must be an integer between 0 and ${String(MAX_MINUTE_OF_DAY)}`,
        );
      }
    }

    if (
      input.waterReminderIntervalHours !== undefined &&
      (!Number.isInteger(input.waterReminderIntervalHours) || input.waterReminderIntervalHours <= 0)
    ) {
      throw new BadRequestException('waterReminderIntervalHours must be a positive integer');
    }

    if (input.timezone !== undefined && !isValidTimezone(input.timezone)) {
      throw new BadRequestException(`Unknown timezone: ${input.timezone}`);
    }
  }

  private toView(
    user: UserRow,
    preferences: NotificationPreferencesRow,
  ): INotificationPreferencesView {
    return {
      userId: user.id,
      timezone: user.timezone,
      mealRemindersEnabled: preferences.meal_reminders_enabled,
      waterRemindersEnabled: preferences.water_reminders_enabled,
      sleepRemindersEnabled: preferences.sleep_reminders_enabled,
      progressNotificationsEnabled: preferences.progress_notifications_enabled,
      breakfastTimeMinutes: preferences.breakfast_time_minutes,
      lunchTimeMinutes: preferences.lunch_time_minutes,
      dinnerTimeMinutes: preferences.dinner_time_minutes,
      sleepReminderTimeMinutes: preferences.sleep_reminder_time_minutes,
      waterReminderTimeMinutes: preferences.water_reminder_time_minutes,
      dailySummaryTimeMinutes: preferences.daily_summary_time_minutes,
      waterReminderIntervalHours: preferences.water_reminder_interval_hours,
      lastWaterReminderAt: preferences.last_water_reminder_at?.toISOString() ?? null,
      updatedAt: preferences.updated_at.toISOString(),
    };
  }
}
