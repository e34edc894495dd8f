import { Injectable } from '@nestjs/common';

import { DatabaseService } from '../kysely/database.service';
import type { UserRow } from '../types/database.types';

@Injectable()
export class UsersRepository {
  public constructor(private readonly databaseService: DatabaseService) {}

  public async findById(userId: string): Promise<UserRow | null> {
    const user: UserRow | undefined = await this.databaseService
      .getDb()
      .selectFrom('users')
      .selectAll()
      .where('id', '=', userId)
      .executeTakeFirst();

    return user ?? null;
  }

  public async updateTimezone(userId: string, timezone: string): Promise<UserRow | null> {
    const user: UserRow | undefined = await this.databaseService
      .getDb()
      .updateTable('users')
      .set({ timezone })
      .where('id', '=', userId)
      .returningAll()
      .executeTakeFirst();

    return user ?? null;
  }
}
