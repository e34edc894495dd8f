import { createPostgrator } from './postgrator';

const run = async (): Promise<void> => {
  const { runner, close } = createPostgrator();

  try {
    const maxVersion: number = await runner.getMaxVersion();
    const migrations = await runner.migrate(String(maxVersion));
    process.stdout.write(
      `Applied migrations: ${String(migrations.length)}. Current version: ${String(maxVersion)}.\n`,
    );
  } finally {
    await close();
  }
};

run().catch((error: unknown): void => {
  const errorMessage: string = error instanceof Error ? error.message : String(error);
  process.stderr.write(`Migration failed: ${errorMessage}\n`);
  process.exitCode = 1;
});
