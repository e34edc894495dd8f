import type { ParsedEnv } from './app-config.schema';
import type { AppConfig } from './app-config.types';

export const mapAppConfig = (parsedEnv: ParsedEnv): AppConfig => ({
  ...mapCoreConfig(parsedEnv),
  ...mapDatabaseConfig(parsedEnv),
  ...mapReminderConfig(parsedEnv),
});

const mapCoreConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  'appVersion' | 'nodeEnv' | 'port' | 'logLevel' | 'metricsEnabled' | 'corsAllowedOrigins'
> => ({
  appVersion: parsedEnv.APP_VERSION,
  nodeEnv: parsedEnv.NODE_ENV,
  port: parsedEnv.PORT,
  logLevel: parsedEnv.LOG_LEVEL,
  metricsEnabled: parsedEnv.METRICS_ENABLED,
  corsAllowedOrigins: parseCsvList(parsedEnv.CORS_ALLOWED_ORIGINS),
});

const mapDatabaseConfig = (
  parsedEnv: ParsedEnv,
): Pick<AppConfig, 'databaseUrl' | 'databasePoolMax' | 'databaseMigrationsOnBoot'> => ({
  databaseUrl: parsedEnv.DATABASE_URL,
  databasePoolMax: parsedEnv.DATABASE_POOL_MAX,
  databaseMigrationsOnBoot: parsedEnv.DATABASE_MIGRATIONS_ON_BOOT,
});

const mapReminderConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  'reminderSchedulerEnabled' | 'waterReminderStrategy' | 'invalidTimezoneWarnCooldownSec'
> => ({
  reminderSchedulerEnabled: parsedEnv.REMINDER_SCHEDULER_ENABLED,
  waterReminderStrategy: parsedEnv.WATER_REMINDER_STRATEGY,
  invalidTimezoneWarnCooldownSec: parsedEnv.INVALID_TIMEZONE_WARN_COOLDOWN_SEC,
});

const parseCsvList = (rawValue: string | undefined): readonly string[] => {
  if (!rawValue) {
    return [];
  }

  return rawValue
    .split(',')
    .map((value: string): string => value.trim())
    .filter((value: string): boolean => value.length > 0);
};
