import { createPostgrator, MIGRATION_PATTERN } from './postgrator';

const run = async (): Promise<void> => {
  const { runner, close } = createPostgrator();

  try {
    const databaseVersion: number = await runner.getDatabaseVersion();
    const maxVersion: number = await runner.getMaxVersion();
    const pending: number = Math.max(maxVersion - databaseVersion, 0);

    process.stdout.write(`Migrations: ${MIGRATION_PATTERN}\n`);
    process.stdout.write(
      `Database version: ${String(databaseVersion)}. Max migration version: ${String(maxVersion)}. Pending: ${String(pending)}.\n`,
    );
  } finally {
    await close();
  }
};

run().catch((error: unknown): void => {
  const errorMessage: string = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Migration info failed: ${errorMessage}\n`);
  process.exitCode = 1;
});
