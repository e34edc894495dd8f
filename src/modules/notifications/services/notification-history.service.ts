import { Injectable, NotFoundException } from '@nestjs/common';

import { NotificationLogsRepository } from '../../../database/repositories/notification-logs.repository';
import type {
  INotificationLogEntry,
  INotificationLogPage,
} from '../../../database/repositories/notification-logs.repository.interfaces';
import { UsersRepository } from '../../../database/repositories/users.repository';
import type { UserRow } from '../../../database/types/database.types';
import type {
  INotificationHistoryEntryView,
  INotificationHistoryQuery,
  INotificationHistoryView,
} from '../entities/notification-history.interfaces';

@Injectable()
export class NotificationHistoryService {
  public constructor(
    private readonly usersRepository: UsersRepository,
    private readonly notificationLogsRepository: NotificationLogsRepository,
  ) {}

  public async getHistory(
    userId: string,
    query: INotificationHistoryQuery,
  ): Promise<INotificationHistoryView> {
    const user: UserRow | null = await this.usersRepository.findById(userId);

    if (user === null) {
      throw new NotFoundException(`User ${userId} not found`);
    }

    const page: INotificationLogPage = await this.notificationLogsRepository.listByUserId(userId, {
      kind: query.kind,
      limit: query.limit,
      offset: query.offset,
    });

    return {
      userId,
      entries: page.entries.map(
        (entry: INotificationLogEntry): INotificationHistoryEntryView => ({
          id: entry.id,
          kind: entry.kind,
          status: entry.status,
          failureReason: entry.failureReason,
          createdAt: entry.createdAt.toISOString(),
        }),
      ),
      total: page.total,
      limit: query.limit,
      offset: query.offset,
    };
  }
}
