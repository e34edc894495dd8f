import { Injectable } from '@nestjs/common';
import { Kysely, PostgresDialect, sql } from 'kysely';
import { Pool } from 'pg';

import { AppConfigService } from '../../config/app-config.service';
import type { IDatabase } from '../types/database.types';

@Injectable()
export class DatabaseService {
  private readonly db: Kysely<IDatabase>;
  private readonly pool: Pool;

  public constructor(private readonly appConfigService: AppConfigService) {
    this.pool = new Pool({
      connectionString: this.appConfigService.databaseUrl,
      max: this.appConfigService.databasePoolMax,
    });

    this.db = new Kysely<IDatabase>({
      dialect: new PostgresDialect({ pool: this.pool }),
    });
  }

  public getDb(): Kysely<IDatabase> {
    return this.db;
  }

  public getPool(): Pool {
    return this.pool;
  }

  public async healthCheck(): Promise<boolean> {
    try {
      await sql`select 1`.execute(this.db);
      return true;
    } catch {
      return false;
    }
  }

  /** Ends the pool. AppModule calls this only after the reminder scheduler has drained. */
  public async destroy(): Promise<void> {
    await this.db.destroy();
  }
}
