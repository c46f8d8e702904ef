import { emptyTableData, type RowOf, type TableData, type TableName } from '../../src/domain/entities.js';
import type { Session, SessionProvider } from '../../src/store/session.js';

type Operation = 'selectIds' | 'selectAll' | 'insertRows' | 'truncate';

/** Error shaped like the one pg raises for a duplicate primary key. */
export class UniqueViolation extends Error {
  readonly code = '23505';
  readonly constraint: string;
  readonly detail: string;

  constructor(table: TableName, id: number) {
    super(`duplicate key value violates unique constraint "${table}_pkey"`);
    this.constraint = `${table}_pkey`;
    this.detail = `Key (id)=(${id}) already exists.`;
  }
}

type Fault = { operation: Operation; table: TableName; error: Error };

class MemorySession implements Session {
  constructor(
    private readonly state: TableData,
    private readonly provider: MemorySessionProvider
  ) {}

  async selectIds(table: TableName): Promise<Set<number>> {
    this.provider.record('selectIds', table);
    const rows: readonly { id: number }[] = this.state[table];
    return new Set(rows.map((row) => row.id));
  }

  async selectAll<T extends TableName>(table: T): Promise<RowOf<T>[]> {
    this.provider.record('selectAll', table);
    return structuredClone(this.state[table]).sort((a, b) => a.id - b.id);
  }

  async insertRows<T extends TableName>(table: T, rows: readonly RowOf<T>[]): Promise<number> {
    this.provider.record('insertRows', table, rows.length);
    const target: RowOf<T>[] = this.state[table];
    const ids = new Set(target.map((row) => row.id));
    for (const row of rows) {
      if (ids.has(row.id)) throw new UniqueViolation(table, row.id);
      ids.add(row.id);
    }
    target.push(...structuredClone(rows));
    return rows.length;
  }

  async truncate(table: TableName): Promise<void> {
    this.provider.record('truncate', table);
    this.state[table] = [];
  }
}

/**
 * In-process store. Each transaction works on a copy of the tables that
 * replaces the committed state only when the callback resolves.
 */
export class MemorySessionProvider implements SessionProvider {
  private committed: TableData;
  private faults: Fault[] = [];
  readonly calls: string[] = [];
  commits = 0;
  rollbacks = 0;

  constructor(initial: Partial<TableData> = {}) {
    this.committed = { ...emptyTableData(), ...structuredClone(initial) };
  }

  get tables(): TableData {
    return structuredClone(this.committed);
  }

  /** Makes the next matching operation throw `error` instead of running. */
  failNext(operation: Operation, table: TableName, error: Error): void {
    this.faults.push({ operation, table, error });
  }

  record(operation: Operation, table: TableName, size?: number): void {
    this.calls.push(size === undefined ? `${operation}:${table}` : `${operation}:${table}:${size}`);
    const index = this.faults.findIndex((fault) => fault.operation === operation && fault.table === table);
    if (index >= 0) {
      const [fault] = this.faults.splice(index, 1);
      throw fault.error;
    }
  }

  async withTransaction<R>(fn: (session: Session) => Promise<R>): Promise<R> {
    const working = structuredClone(this.committed);
    try {
      const result = await fn(new MemorySession(working, this));
      this.committed = working;
      this.commits += 1;
      return result;
    } catch (error) {
      this.rollbacks += 1;
      throw error;
    }
  }
}
