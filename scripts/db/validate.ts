import { createPostgrator } from './postgrator';

const run = async (): Promise<void> => {
  const { runner, close } = createPostgrator();

  try {
    const databaseVersion: number = await runner.getDatabaseVersion();
    await runner.validateMigrations(databaseVersion);
    process.stdout.write(`Checksums match applied migrations up to version ${String(databaseVersion)}.\n`);
  } finally {
    await close();
  }
};

run().catch((error: unknown): void => {
  const errorMessage: string = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Migration validation failed: ${errorMessage}\n`);
  process.exitCode = 1;
});
