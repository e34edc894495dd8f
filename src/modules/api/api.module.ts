import { Module } from '@nestjs/common';

import { NotificationPreferencesController } from './controllers/notification-preferences.controller';
import { NotificationsController } from './controllers/notifications.controller';
import { NotificationsModule } from '../notifications/notifications.module';

@Module({
  imports: [NotificationsModule],
  controllers: [NotificationPreferencesController, NotificationsController],
})
export class ApiModule {}
