import { Module } from '@nestjs/common';

import { DatabaseService } from './kysely/database.service';
import { MigrationService } from './migrations/migration.service';
import { NotificationLogsRepository } from './repositories/notification-logs.repository';
import { NotificationPreferencesRepository } from './repositories/notification-preferences.repository';
import { UsersRepository } from './repositories/users.repository';

@Module({
  providers: [
    MigrationService,
    DatabaseService,
    UsersRepository,
    NotificationPreferencesRepository,
    NotificationLogsRepository,
  ],
  exports: [
    DatabaseService,
    UsersRepository,
    NotificationPreferencesRepository,
    NotificationLogsRepository,
  ],
})
export class DatabaseModule {}
