import {
  Inject,
  Logger,
  Module,
  type OnApplicationBootstrap,
  type OnApplicationShutdown,
} from '@nestjs/common';

import { AppConfigService } from './config/app-config.service';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { DatabaseService } from './database/kysely/database.service';
import { ApiModule } from './modules/api/api.module';
import { HealthModule } from './modules/health/health.module';
import { NotificationsModule } from './modules/notifications/notifications.module';
import { REMINDER_SCHEDULER } from './modules/notifications/scheduler/reminder-scheduler-port.tokens';
import type { IReminderScheduler } from './modules/notifications/scheduler/reminder-scheduler.interfaces';
import { ObservabilityModule } from './modules/observability/observability.module';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    ObservabilityModule,
    NotificationsModule,
    ApiModule,
    HealthModule,
  ],
})
export class AppModule implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger: Logger = new Logger(AppModule.name);

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly databaseService: DatabaseService,
    @Inject(REMINDER_SCHEDULER)
    private readonly reminderScheduler: IReminderScheduler,
  ) {}

  public onApplicationBootstrap(): void {
    if (!this.appConfigService.reminderSchedulerEnabled) {
      this.logger.log('reminder_scheduler_disabled reason=REMINDER_SCHEDULER_ENABLED=false');
      return;
    }

    this.reminderScheduler.start();
  }

  public async onApplicationShutdown(signal?: string): Promise<void> {
    this.logger.log(`application_shutdown signal=${signal ?? 'n/a'}`);
    await this.reminderScheduler.shutdown();
    await this.databaseService.destroy();
  }
}
