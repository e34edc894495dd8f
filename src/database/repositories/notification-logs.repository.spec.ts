import { describe, expect, it, vi } from 'vitest';

import { NotificationLogsRepository } from './notification-logs.repository';
import { ReminderKind } from '../../modules/notifications/entities/reminder.interfaces';
import type { DatabaseService } from '../kysely/database.service';

type DatabaseServiceStub = {
  readonly getDb: ReturnType<typeof vi.fn>;
};

type SelectQueryStub = {
  readonly where: ReturnType<typeof vi.fn>;
  readonly selectAll: ReturnType<typeof vi.fn>;
  readonly select: ReturnType<typeof vi.fn>;
  readonly orderBy: ReturnType<typeof vi.fn>;
  readonly limit: ReturnType<typeof vi.fn>;
  readonly offset: ReturnType<typeof vi.fn>;
  readonly execute: ReturnType<typeof vi.fn>;
  readonly executeTakeFirst: ReturnType<typeof vi.fn>;
};

const createSelectQueryStub = (rows: readonly unknown[], total: string): SelectQueryStub => {
  const query: SelectQueryStub = {
    where: vi.fn(),
    selectAll: vi.fn(),
    select: vi.fn(),
    orderBy: vi.fn(),
    limit: vi.fn(),
    offset: vi.fn(),
    execute: vi.fn().mockResolvedValue(rows),
    executeTakeFirst: vi.fn().mockResolvedValue({ total }),
  };

  query.where.mockReturnValue(query);
  query.selectAll.mockReturnValue(query);
  query.select.mockReturnValue(query);
  query.orderBy.mockReturnValue(query);
  query.limit.mockReturnValue(query);
  query.offset.mockReturnValue(query);

  return query;
};

describe('NotificationLogsRepository', (): void => {
  it('inserts one log row per delivery attempt', async (): Promise<void> => {
    const execute = vi.fn().mockResolvedValue([]);
    const values = vi.fn().mockReturnValue({ execute });
    const insertInto = vi.fn().mockReturnValue({ values });
    const databaseServiceStub: DatabaseServiceStub = {
      getDb: vi.fn().mockReturnValue({ insertInto }),
    };
    const repository: NotificationLogsRepository = new NotificationLogsRepository(
      databaseServiceStub as unknown as DatabaseService,
    );
    const createdAt: Date = new Date('2024-01-15T02:00:00Z');

    await repository.recordDelivery({
      userId: 'user-1',
      kind: ReminderKind.WATER,
      status: 'failed',
      failureReason: 'token expired',
      createdAt,
    });

    expect(insertInto).toHaveBeenCalledWith('notification_logs');
    expect(values).toHaveBeenCalledWith({
      user_id: 'user-1',
      reminder_kind: 'water_reminder',
      status: 'failed',
      failure_reason: 'token expired',
      created_at: createdAt,
    });
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it('lists a page of deliveries newest first with the filtered total', async (): Promise<void> => {
    const createdAt: Date = new Date('2024-01-15T09:00:00Z');
    const query: SelectQueryStub = createSelectQueryStub(
      [
        {
          id: '42',
          user_id: 'user-1',
          reminder_kind: 'water_reminder',
          status: 'sent',
          failure_reason: null,
          created_at: createdAt,
        },
      ],
      '7',
    );
    const selectFrom = vi.fn().mockReturnValue(query);
    const databaseServiceStub: DatabaseServiceStub = {
      getDb: vi.fn().mockReturnValue({ selectFrom }),
    };
    const repository: NotificationLogsRepository = new NotificationLogsRepository(
      databaseServiceStub as unknown as DatabaseService,
    );

    const page = await repository.listByUserId('user-1', {
      kind: ReminderKind.WATER,
      limit: 20,
      offset: 40,
    });

    expect(selectFrom).toHaveBeenCalledWith('notification_logs');
    expect(query.where).toHaveBeenNthCalledWith(1, 'user_id', '=', 'user-1');
    expect(query.where).toHaveBeenNthCalledWith(2, 'reminder_kind', '=', 'water_reminder');
    expect(query.orderBy).toHaveBeenNthCalledWith(1, 'created_at', 'desc');
    expect(query.limit).toHaveBeenCalledWith(20);
    expect(query.offset).toHaveBeenCalledWith(40);
    expect(page).toEqual({
      entries: [
        {
          id: '42',
          kind: 'water_reminder',
          status: 'sent',
          failureReason: null,
          createdAt,
        },
      ],
      total: 7,
    });
  });

  it('skips the kind filter when none is given', async (): Promise<void> => {
    const query: SelectQueryStub = createSelectQueryStub([], '0');
    const databaseServiceStub: DatabaseServiceStub = {
      getDb: vi.fn().mockReturnValue({ selectFrom: vi.fn().mockReturnValue(query) }),
    };
    const repository: NotificationLogsRepository = new NotificationLogsRepository(
      databaseServiceStub as unknown as DatabaseService,
    );

    const page = await repository.listByUserId('user-1', { limit: 50, offset: 0 });

    expect(query.where).toHaveBeenCalledTimes(1);
    expect(page).toEqual({ entries: [], total: 0 });
  });
});
