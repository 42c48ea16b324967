/**
 * Database Connection for Neon Postgres + Drizzle ORM
 *
 * Requires DATABASE_URL environment variable unless a URL is passed in.
 */

import { neon } from '@neondatabase/serverless';
import { drizzle } from 'drizzle-orm/neon-http';

import { getDatabaseUrl } from '../config/runtime';
import * as schema from './schema';

export function createDatabase(url: string = getDatabaseUrl()) {
  return drizzle(neon(url), { schema });
}

// Export type for the db instance
export type Database = ReturnType<typeof createDatabase>;

// Re-export schema types for convenience
export * from './schema';
