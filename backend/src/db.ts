import { Pool, type PoolClient } from 'pg';
import type { DbConfig } from './config.js';
import { PgSession, type SqlClient } from './store/pg-session.js';
import type { Session, SessionProvider } from './store/session.js';

export function createPool(config: DbConfig): Pool {
  return new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
  });
}

export function toSqlClient(queryable: Pool | PoolClient): SqlClient {
  return {
    query: (text, values) =>
      queryable instanceof Pool ? queryable.query(text, values) : queryable.query(text, values),
  };
}

export class PgSessionProvider implements SessionProvider {
  constructor(private readonly pool: Pool) {}

  async withTransaction<R>(fn: (session: Session) => Promise<R>): Promise<R> {
    const client = await this.pool.connect();
    try {
      await client.query('begin');
      const result = await fn(new PgSession(toSqlClient(client)));
      await client.query('commit');
      return result;
    } catch (error) {
      await client.query('rollback');
      throw error;
    } finally {
      client.release();
    }
  }
}

export async function ensureSchema(client: SqlClient): Promise<void> {
  await client.query(`
    create table if not exists departments (
      id integer primary key,
      name text not null
    )
  `);

  await client.query(`
    create table if not exists jobs (
      id integer primary key,
      name text not null
    )
  `);

  await client.query(`
    create table if not exists hired_employees (
      id integer primary key,
      name text,
      datetime timestamptz,
      department_id integer,
      job_id integer
    )
  `);

  await client.query(
    `create index if not exists idx_hired_employees_department_job on hired_employees(department_id, job_id)`
  );
}
