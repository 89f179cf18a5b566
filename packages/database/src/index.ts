import { type MySql2Database, drizzle } from 'drizzle-orm/mysql2'
import mysql, { type Pool } from 'mysql2/promise'
import { env } from './env'
import * as schema from './schema'

export type Database = MySql2Database<typeof schema>

let db: Database | null = null
let pool: Pool | null = null

export function hasDatabaseUrl(): boolean {
  return !!env.DATABASE_URL
}

export function getDb(): Database {
  if (!db) {
    if (!env.DATABASE_URL) {
      throw new Error(
        'DATABASE_URL is not set. This command requires a database connection.\n' +
          'Set DATABASE_URL in your environment.'
      )
    }
    // mysql2 doesn't recognize ?sslaccept=strict; it turns on the ssl option instead
    const url = new URL(env.DATABASE_URL)
    const requireSsl = url.searchParams.has('sslaccept')
    url.searchParams.delete('sslaccept')

    pool = mysql.createPool({
      uri: url.toString(),
      ssl: requireSsl ? { rejectUnauthorized: true } : undefined,
    })
    db = drizzle(pool, { schema, mode: 'default' })
  }
  return db
}

/**
 * Close the database connection pool.
 * Call this before process exit in CLI commands to prevent hanging.
 */
export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end()
    pool = null
    db = null
  }
}

// Re-export schema and types for convenience
export * from './schema'
export { env }

// Re-export drizzle operators for queries
export { eq, desc, sql, count, sum } from 'drizzle-orm'
