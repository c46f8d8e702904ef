import type { QueryResult, QueryResultRow } from 'pg';
import { z } from 'zod';
import { ROW_SCHEMAS, TABLE_COLUMNS, type RowOf, type TableName } from '../domain/entities.js';
import type { Session } from './session.js';

/** The slice of a pg `Pool` or `PoolClient` the store needs; rows are parsed by the caller. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}

const idRowSchema = z.object({ id: z.number().int() });

export class PgSession implements Session {
  constructor(private readonly client: SqlClient) {}

  async selectIds(table: TableName): Promise<Set<number>> {
    const { rows } = await this.client.query(`select id from ${table}`);
    return new Set(rows.map((row) => idRowSchema.parse(row).id));
  }

  async selectAll<T extends TableName>(table: T): Promise<RowOf<T>[]> {
    const columns = TABLE_COLUMNS[table];
    const { rows } = await this.client.query(`select ${columns.join(', ')} from ${table} order by id`);
    const schema = ROW_SCHEMAS[table];
    return rows.map((row) => schema.parse(row));
  }

  async insertRows<T extends TableName>(table: T, rows: readonly RowOf<T>[]): Promise<number> {
    if (!rows.length) return 0;

    const columns = TABLE_COLUMNS[table];
    const values: unknown[] = [];
    const tuples = rows.map((row) => {
      const placeholders = columns.map((column) => {
        values.push(row[column]);
        return `$${values.length}`;
      });
      return `(${placeholders.join(', ')})`;
    });

    const result = await this.client.query(
      `insert into ${table} (${columns.join(', ')}) values ${tuples.join(', ')}`,
      values
    );
    return result.rowCount ?? rows.length;
  }

  async truncate(table: TableName): Promise<void> {
    await this.client.query(`truncate table ${table} restart identity`);
  }
}
