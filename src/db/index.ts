import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export function createDb(databaseUrl: string, options: { ssl: boolean }) {
  const client = postgres(databaseUrl, {
    ssl: options.ssl ? 'require' : false,
  });
  return { db: drizzle(client, { schema }), client };
}

export type DB = ReturnType<typeof createDb>['db'];
