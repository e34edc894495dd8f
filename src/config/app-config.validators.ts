import type { ParsedEnv } from './app-config.schema';

export function assertAppConfig(parsedEnv: ParsedEnv): void {
  assertDatabaseUrl(parsedEnv);
}

function assertDatabaseUrl(parsedEnv: ParsedEnv): void {
  const protocol: string = new URL(parsedEnv.DATABASE_URL).protocol;

  if (protocol !== 'postgres:' && protocol !== 'postgresql:') {
    throw new Error('DATABASE_URL must use the postgres:// or postgresql:// scheme');
  }
}
