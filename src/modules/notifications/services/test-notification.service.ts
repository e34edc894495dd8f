import { Injectable, Logger, NotFoundException } from '@nestjs/common';

import { ReminderDispatcherService } from './reminder-dispatcher.service';
import { ReminderMessageFormatter } from './reminder-message.formatter';
import type {
  IDeliveryResult,
  IReminderMessage,
} from '../../../common/interfaces/notifications/notification-sender.interfaces';
import { UsersRepository } from '../../../database/repositories/users.repository';
import type { UserRow } from '../../../database/types/database.types';
import type { ITestNotificationResult } from '../entities/notification-history.interfaces';

@Injectable()
export class TestNotificationService {
  private readonly logger: Logger = new Logger(TestNotificationService.name);

  public constructor(
    private readonly usersRepository: UsersRepository,
    private readonly reminderMessageFormatter: ReminderMessageFormatter,
    private readonly reminderDispatcherService: ReminderDispatcherService,
  ) {}

  public async sendTest(
    userId: string,
    sentAt: Date = new Date(),
  ): Promise<ITestNotificationResult> {
    const user: UserRow | null = await this.usersRepository.findById(userId);

    if (user === null) {
      throw new NotFoundException(`User ${userId} not found`);
    }

    const message: IReminderMessage = this.reminderMessageFormatter.formatTest(userId, sentAt);
    const deliveryResult: IDeliveryResult = await this.reminderDispatcherService.deliverMessage(
      message,
      sentAt,
    );

    this.logger.log(
      `test_notification_sent userId=${userId} delivered=${String(deliveryResult.delivered)}`,
    );

    return {
      userId,
      delivered: deliveryResult.delivered,
      failureReason: deliveryResult.failureReason,
      sentAt: sentAt.toISOString(),
    };
  }
}
