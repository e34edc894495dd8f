import type { WaterReminderStrategy } from '../modules/notifications/entities/reminder.interfaces';

export type NodeEnv = 'development' | 'test' | 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type AppConfig = {
  readonly appVersion: string;
  readonly nodeEnv: NodeEnv;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly databaseUrl: string;
  readonly databasePoolMax: number;
  readonly databaseMigrationsOnBoot: boolean;
  readonly reminderSchedulerEnabled: boolean;
  readonly waterReminderStrategy: WaterReminderStrategy;
  readonly invalidTimezoneWarnCooldownSec: number;
  readonly metricsEnabled: boolean;
  readonly corsAllowedOrigins: readonly string[];
};
