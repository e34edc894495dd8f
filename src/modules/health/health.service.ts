import { Inject, Injectable } from '@nestjs/common';

import type { AppHealthStatus, ComponentHealth } from './health.types';
import { AppConfigService } from '../../config/app-config.service';
import { DatabaseService } from '../../database/kysely/database.service';
import { REMINDER_SCHEDULER } from '../notifications/scheduler/reminder-scheduler-port.tokens';
import type { IReminderScheduler } from '../notifications/scheduler/reminder-scheduler.interfaces';

@Injectable()
export class HealthService {
  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly databaseService: DatabaseService,
    @Inject(REMINDER_SCHEDULER)
    private readonly reminderScheduler: IReminderScheduler,
  ) {}

  public async getHealthStatus(): Promise<AppHealthStatus> {
    const databaseOk: boolean = await this.databaseService.healthCheck();

    const database: ComponentHealth = {
      ok: databaseOk,
      details: databaseOk ? 'reachable' : 'unreachable',
    };
    const reminderScheduler: ComponentHealth = this.resolveSchedulerHealth();

    return {
      status: database.ok && reminderScheduler.ok ? 'ok' : 'degraded',
      version: this.appConfigService.appVersion,
      database,
      reminderScheduler,
    };
  }

  private resolveSchedulerHealth(): ComponentHealth {
    if (!this.appConfigService.reminderSchedulerEnabled) {
      return {
        ok: true,
        details: 'disabled by REMINDER_SCHEDULER_ENABLED=false',
      };
    }

    return this.reminderScheduler.isRunning
      ? { ok: true, details: 'running' }
      : { ok: false, details: 'stopped' };
  }
}
