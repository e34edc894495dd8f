import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { resolve } from 'node:path';
import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import Postgrator from 'postgrator';

import { AppConfigService } from '../../config/app-config.service';

type ExecQueryResult = {
  rows: QueryResultRow[];
};

type AppliedMigrations = Awaited<ReturnType<Postgrator['migrate']>>;

const MIGRATION_PATTERN_RELATIVE = 'database/migrations/*.sql';

@Injectable()
export class MigrationService implements OnModuleInit {
  private readonly logger: Logger = new Logger(MigrationService.name);

  public constructor(private readonly appConfigService: AppConfigService) {}

  public async onModuleInit(): Promise<void> {
    if (!this.appConfigService.databaseMigrationsOnBoot) {
      this.logger.log('migrations_skipped reason=disabled_on_boot');
      return;
    }

    const pool: Pool = new Pool({
      connectionString: this.appConfigService.databaseUrl,
      max: 1,
    });

    try {
      const runner: Postgrator = new Postgrator({
        driver: 'pg',
        migrationPattern: resolve(process.cwd(), MIGRATION_PATTERN_RELATIVE),
        schemaTable: 'schemaversion',
        validateChecksums: true,
        currentSchema: 'public',
        execQuery: async (query: string): Promise<ExecQueryResult> => {
          const result: QueryResult<QueryResultRow> = await pool.query(query);
          return { rows: result.rows };
        },
      });

      const maxVersion: number = await runner.getMaxVersion();
      const migrations: AppliedMigrations = await runner.migrate(String(maxVersion));

      if (migrations.length > 0) {
        this.logger.log(
          `migrations_applied count=${String(migrations.length)} version=${String(maxVersion)}`,
        );
      } else {
        this.logger.log(`migrations_up_to_date version=${String(maxVersion)}`);
      }
    } finally {
      await pool.end();
    }
  }
}
