import { Injectable, Logger } from '@nestjs/common';

import type {
  IDeliveryResult,
  INotificationSender,
  IReminderMessage,
} from '../../../common/interfaces/notifications/notification-sender.interfaces';

/**
 * Default sender binding: writes each reminder to the application log and
 * reports it as delivered. Swap it for a push or email adapter through the
 * NOTIFICATION_SENDER token.
 */
@Injectable()
export class LoggingNotificationSender implements INotificationSender {
  private readonly logger: Logger = new Logger(LoggingNotificationSender.name);

  public async send(message: IReminderMessage): Promise<IDeliveryResult> {
    this.logger.log(
      `reminder_sent userId=${message.userId} kind=${message.kind} title=${message.title}`,
    );

    return { delivered: true, failureReason: null };
  }
}
