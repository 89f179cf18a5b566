import type { Config } from 'drizzle-kit'

const databaseUrl = process.env.DATABASE_URL
if (!databaseUrl) {
  throw new Error('DATABASE_URL is required to run drizzle-kit')
}

// Parse DATABASE_URL for drizzle-kit (needs explicit credentials)
const url = new URL(databaseUrl.replace('mysql://', 'http://'))

export default {
  schema: ['./packages/database/src/schema.ts'],
  dialect: 'mysql',
  dbCredentials: {
    host: url.hostname,
    port: url.port ? parseInt(url.port) : 3306,
    user: url.username,
    password: url.password,
    database: url.pathname.slice(1), // remove leading /
  },
  tablesFilter: ['TRIAGE_*'],
  out: './packages/database/drizzle',
} satisfies Config
