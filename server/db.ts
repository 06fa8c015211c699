import pg from "pg";
import { config } from "./config";

/** The subset of `pg.Pool` the store needs; lets tests hand in an in-process stand-in. */
export type Queryable = Pick<pg.Pool, "query">;

const pool = new pg.Pool({
  connectionString: config.databaseUrl,
});

export async function runMigration(db: Queryable, name: string, sql: string): Promise<void> {
  const { rows } = await db.query(
    `SELECT id FROM schema_migrations WHERE name = $1`,
    [name]
  );
  if (rows.length > 0) return;
  console.log(`[migration] applying: ${name}`);
  await db.query(sql);
  await db.query(
    `INSERT INTO schema_migrations (name) VALUES ($1)`,
    [name]
  );
  console.log(`[migration] applied: ${name}`);
}

export async function initDb(db: Queryable = pool): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      name TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await runMigration(db, '001_activities', `
    CREATE TABLE IF NOT EXISTS activities (
      hash TEXT PRIMARY KEY,
      filename TEXT NOT NULL,
      activity_date TEXT NOT NULL,
      session_id BIGINT,
      metrics_json TEXT NOT NULL,
      imported_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await runMigration(db, '002_activities_date_idx', `
    CREATE INDEX IF NOT EXISTS idx_activities_date ON activities(activity_date);
  `);

  await runMigration(db, '003_activities_session_idx', `
    CREATE INDEX IF NOT EXISTS idx_activities_session ON activities(session_id);
  `);
}

export { pool };
