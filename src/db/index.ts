import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { config } from '../config';
import * as schema from './schema';
import * as contractsSchema from './contracts-schema';

export const fullSchema = { ...schema, ...contractsSchema };

export type Database = ReturnType<typeof createDatabase>['db'];

/**
 * Open the PostgreSQL pool and wrap it with Drizzle.
 * Callers own the returned client and must `end()` it on shutdown.
 */
export function createDatabase(url: string | undefined = config.databaseUrl) {
  if (!url) {
    throw new Error('DATABASE_URL is missing');
  }

  const client = postgres(url, {
    prepare: false,          // Required for PgBouncer Transaction mode
    max: config.dbPoolMax,
    idle_timeout: 0,
    connect_timeout: 5,
    onnotice: () => {},      // Suppress notices

    connection: {
      application_name: 'proposal-service',
    },
  });

  return { client, db: drizzle(client, { schema: fullSchema }) };
}
