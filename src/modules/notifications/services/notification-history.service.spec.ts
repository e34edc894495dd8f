import { NotFoundException } from '@nestjs/common';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { NotificationHistoryService } from './notification-history.service';
import type { NotificationLogsRepository } from '../../../database/repositories/notification-logs.repository';
import type { UsersRepository } from '../../../database/repositories/users.repository';
import type { INotificationHistoryView } from '../entities/notification-history.interfaces';
import { ReminderKind } from '../entities/reminder.interfaces';

type UsersRepositoryStub = {
  readonly findById: ReturnType<typeof vi.fn>;
};

type NotificationLogsRepositoryStub = {
  readonly listByUserId: ReturnType<typeof vi.fn>;
};

describe('NotificationHistoryService', (): void => {
  let usersRepositoryStub: UsersRepositoryStub;
  let logsRepositoryStub: NotificationLogsRepositoryStub;
  let service: NotificationHistoryService;

  beforeEach((): void => {
    usersRepositoryStub = {
      findById: vi.fn().mockResolvedValue({
        id: 'user-1',
        email: 'user-1@example.com',
        timezone: 'UTC',
        created_at: new Date('2024-01-01T00:00:00Z'),
      }),
    };
    logsRepositoryStub = {
      listByUserId: vi.fn().mockResolvedValue({
        entries: [
          {
            id: '12',
            kind: 'sleep_reminder',
            status: 'failed',
            failureReason: 'token expired',
            createdAt: new Date('2024-01-14T22:00:00Z'),
          },
        ],
        total: 3,
      }),
    };
    service = new NotificationHistoryService(
      usersRepositoryStub as unknown as UsersRepository,
      logsRepositoryStub as unknown as NotificationLogsRepository,
    );
  });

  it('returns a page of deliveries with iso timestamps', async (): Promise<void> => {
    const history: INotificationHistoryView = await service.getHistory('user-1', {
      kind: ReminderKind.SLEEP,
      limit: 1,
      offset: 2,
    });

    expect(logsRepositoryStub.listByUserId).toHaveBeenCalledWith('user-1', {
      kind: ReminderKind.SLEEP,
      limit: 1,
      offset: 2,
    });
    expect(history).toEqual({
      userId: 'user-1',
      entries: [
        {
          id: '12',
          kind: 'sleep_reminder',
          status: 'failed',
          failureReason: 'token expired',
          createdAt: '2024-01-14T22:00:00.000Z',
        },
      ],
      total: 3,
      limit: 1,
      offset: 2,
    });
  });

  it('rejects an unknown user before reading the log', async (): Promise<void> => {
    usersRepositoryStub.findById.mockResolvedValue(null);

    await expect(service.getHistory('missing', { limit: 50, offset: 0 })).rejects.toBeInstanceOf(
      NotFoundException,
    );
    expect(logsRepositoryStub.listByUserId).not.toHaveBeenCalled();
  });
});
