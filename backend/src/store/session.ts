import type { RowOf, TableName } from '../domain/entities.js';

/**
 * Unit of work bound to one store transaction. A session is only valid inside
 * the callback handed to {@link SessionProvider.withTransaction}.
 */
export interface Session {
  selectIds(table: TableName): Promise<Set<number>>;
  selectAll<T extends TableName>(table: T): Promise<RowOf<T>[]>;
  insertRows<T extends TableName>(table: T, rows: readonly RowOf<T>[]): Promise<number>;
  truncate(table: TableName): Promise<void>;
}

export interface SessionProvider {
  /** Commits when `fn` resolves, rolls back and rethrows when it rejects. */
  withTransaction<R>(fn: (session: Session) => Promise<R>): Promise<R>;
}
