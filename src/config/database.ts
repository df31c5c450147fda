import type { PgDatabase } from 'drizzle-orm/pg-core';
import { drizzle, type PostgresJsDatabase, type PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from '../models/schema';
import { logger } from '../utils/logger';
import { env } from './env';

export type Database = PostgresJsDatabase<typeof schema>;
/** The database or an open transaction on it. */
export type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

const isProd = env.NODE_ENV === 'production';

let queryClient: ReturnType<typeof postgres> | null = null;
let database: Database | null = null;

// The client is created on first use so the memory store never opens a pool.
export function getDatabase(): Database {
  if (database) return database;

  queryClient = postgres({
    host: env.DB_HOST,
    port: env.DB_PORT,
    username: env.DB_USER,
    password: env.DB_PASSWORD,
    database: env.DB_NAME,
    max: env.DB_POOL_MAX ?? (isProd ? 10 : 5),
    idle_timeout: env.DB_IDLE_TIMEOUT ?? 20,
    connect_timeout: env.DB_CONNECT_TIMEOUT ?? (isProd ? 5 : 10),
    onnotice: () => {},
    ssl: isProd ? 'require' : false,
  });

  database = drizzle(queryClient, { schema });
  return database;
}

export async function testConnection(): Promise<boolean> {
  getDatabase();
  if (!queryClient) return false;

  try {
    await queryClient`SELECT 1`;
    logger.info('Database connection successful');
    return true;
  } catch (error) {
    logger.error({ error }, 'Database connection failed');
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  if (!queryClient) return;
  await queryClient.end();
  queryClient = null;
  database = null;
}
