import path from 'node:path';
import { Pool, type QueryResult, type QueryResultRow } from 'pg';
import Postgrator from 'postgrator';

type ExecQueryResult = {
  rows: QueryResultRow[];
};

type PostgratorContext = {
  readonly runner: Postgrator;
  readonly close: () => Promise<void>;
};

export const MIGRATION_PATTERN: string = path.resolve(
  process.cwd(),
  'database/migrations/*.sql',
);
export const SCHEMA_TABLE: string = 'schemaversion';

const getDatabaseUrl = (): string => {
  const databaseUrl: string | undefined = process.env['DATABASE_URL'];

  if (!databaseUrl) {
    throw new Error('DATABASE_URL is required for migrations.');
  }

  return databaseUrl;
};

export const createMigrationRunner = (pool: Pool): Postgrator =>
  new Postgrator({
    driver: 'pg',
    migrationPattern: MIGRATION_PATTERN,
    schemaTable: SCHEMA_TABLE,
    validateChecksums: true,
    currentSchema: 'public',
    execQuery: async (query: string): Promise<ExecQueryResult> => {
      const result: QueryResult<QueryResultRow> = await pool.query(query);
      return { rows: result.rows };
    },
  });

export const createPostgrator = (): PostgratorContext => {
  const pool: Pool = new Pool({
    connectionString: getDatabaseUrl(),
    max: 1,
  });

  return {
    runner: createMigrationRunner(pool),
    close: async (): Promise<void> => {
      await pool.end();
    },
  };
};
