import { Injectable } from '@nestjs/common';

import type {
  IListDeliveriesOptions,
  INotificationLogEntry,
  INotificationLogPage,
  IRecordDeliveryInput,
} from './notification-logs.repository.interfaces';
import { DatabaseService } from '../kysely/database.service';
import type { NewNotificationLogRow, NotificationLogRow } from '../types/database.types';

@Injectable()
export class NotificationLogsRepository {
  public constructor(private readonly databaseService: DatabaseService) {}

  public async recordDelivery(input: IRecordDeliveryInput): Promise<void> {
    const insertRow: NewNotificationLogRow = {
      user_id: input.userId,
      reminder_kind: input.kind,
      status: input.status,
      failure_reason: input.failureReason,
      created_at: input.createdAt,
    };

    await this.databaseService.getDb().insertInto('notification_logs').values(insertRow).execute();
  }

  /**
   * Newest-first page of one user's delivery log, with the total row count
   * for the same filter.
   */
  public async listByUserId(
    userId: string,
    options: IListDeliveriesOptions,
  ): Promise<INotificationLogPage> {
    let query = this.databaseService
      .getDb()
      .selectFrom('notification_logs')
      .where('user_id', '=', userId);

    if (options.kind !== undefined) {
      query = query.where('reminder_kind', '=', options.kind);
    }

    const rows: readonly NotificationLogRow[] = await query
      .selectAll()
      .orderBy('created_at', 'desc')
      .orderBy('id', 'desc')
      .limit(options.limit)
      .offset(options.offset)
      .execute();
    const countRow: { total: string | number | bigint } | undefined = await query
      .select((eb) => eb.fn.countAll().as('total'))
      .executeTakeFirst();

    return {
      entries: rows.map((row: NotificationLogRow): INotificationLogEntry => this.mapRow(row)),
      total: Number(countRow?.total ?? 0),
    };
  }

  private mapRow(row: NotificationLogRow): INotificationLogEntry {
    return {
      id: row.id,
      kind: row.reminder_kind,
      status: row.status,
      failureReason: row.failure_reason,
      createdAt: row.created_at,
    };
  }
}
