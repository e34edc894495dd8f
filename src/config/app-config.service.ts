import { Injectable } from '@nestjs/common';

import { envSchema, type ParsedEnv } from './app-config.schema';
import { mapAppConfig } from './app-config.mapper';
import type { AppConfig } from './app-config.types';
import { assertAppConfig } from './app-config.validators';
import type { WaterReminderStrategy } from '../modules/notifications/entities/reminder.interfaces';

@Injectable()
export class AppConfigService {
  private readonly config: AppConfig;

  public constructor() {
    const parsedEnv: ParsedEnv = envSchema.parse(process.env);
    assertAppConfig(parsedEnv);

    this.config = mapAppConfig(parsedEnv);
  }

  public get appVersion(): string {
    return this.config.appVersion;
  }

  public get nodeEnv(): AppConfig['nodeEnv'] {
    return this.config.nodeEnv;
  }

  public get port(): number {
    return this.config.port;
  }

  public get logLevel(): AppConfig['logLevel'] {
    return this.config.logLevel;
  }

  public get databaseUrl(): string {
    return this.config.databaseUrl;
  }

  public get databasePoolMax(): number {
    return this.config.databasePoolMax;
  }

  public get databaseMigrationsOnBoot(): boolean {
    return this.config.databaseMigrationsOnBoot;
  }

  public get reminderSchedulerEnabled(): boolean {
    return this.config.reminderSchedulerEnabled;
  }

  public get waterReminderStrategy(): WaterReminderStrategy {
    return this.config.waterReminderStrategy;
  }

  public get invalidTimezoneWarnCooldownSec(): number {
    return this.config.invalidTimezoneWarnCooldownSec;
  }

  public get metricsEnabled(): boolean {
    return this.config.metricsEnabled;
  }

  public get corsAllowedOrigins(): readonly string[] {
    return this.config.corsAllowedOrigins;
  }
}
