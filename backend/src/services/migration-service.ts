import { CsvTransformError, parseTableCsv } from '../codec/csv.js';
import { TABLES, type RowOf, type TableName } from '../domain/entities.js';
import { IngestionError, constraintViolation, infrastructureFault, notFound } from '../errors.js';
import type { ObjectStorage } from '../storage/object-storage.js';
import type { SessionProvider } from '../store/session.js';
import { createLogger } from '../utils/logger.js';
import { loadRows } from './transactional-writer.js';

const logger = createLogger('migration');

export const DEFAULT_MIGRATION_CHUNK_SIZE = 10000;

const MAX_REPORTED_CONFLICTS = 20;

export type MigrationDeps = {
  sessions: SessionProvider;
  objects: ObjectStorage;
  chunkSize?: number;
};

export type MigrationSummary = {
  message: string;
  tables: Partial<Record<TableName, number>>;
};

export function rawDataKey(table: TableName): string {
  return `raw_data/${table}.csv`;
}

function readRawRows<T extends TableName>(table: T, text: string): RowOf<T>[] {
  try {
    return parseTableCsv(table, text);
  } catch (error) {
    if (error instanceof CsvTransformError) {
      throw new IngestionError('validation_failed', error.message, { errors: error.problems });
    }
    throw error;
  }
}

async function migrateTable<T extends TableName>(
  { sessions, objects, chunkSize = DEFAULT_MIGRATION_CHUNK_SIZE }: MigrationDeps,
  table: T
): Promise<number> {
  const key = rawDataKey(table);
  const text = await objects.getText(key);
  if (text === null) {
    throw notFound(`CSV file for table '${table}' not found.`, { key });
  }

  const rows = readRawRows(table, text);

  return sessions.withTransaction(async (session) => {
    const existing = await session.selectIds(table);
    const conflicts = rows.filter((row) => existing.has(row.id)).map((row) => row.id);
    if (conflicts.length) {
      throw constraintViolation(`Table '${table}' already contains ${conflicts.length} of the incoming ids.`, {
        conflictingIds: conflicts.slice(0, MAX_REPORTED_CONFLICTS),
      });
    }

    return loadRows(session, table, rows, { chunkSize });
  });
}

/**
 * Loads the historical CSV snapshot of every table, in dependency order.
 * Each table is atomic on its own; the first failure stops the run and the
 * tables already migrated stay committed.
 */
export async function migrateHistoricalData(deps: MigrationDeps): Promise<MigrationSummary> {
  const tables: MigrationSummary['tables'] = {};
  const completed: TableName[] = [];

  for (const table of TABLES) {
    try {
      const count = await migrateTable(deps, table);
      tables[table] = count;
      completed.push(table);
      logger.info(`Successfully migrated ${count} records into ${table}`);
    } catch (error) {
      if (error instanceof IngestionError) {
        logger.warn(`Migration of ${table} failed: ${error.message}`);
        throw error.withDetails({ table, completed });
      }
      logger.error(`Unexpected error occurred while migrating data for table ${table}`, error);
      throw infrastructureFault(`Unexpected error while migrating data for table '${table}'.`, { table, completed });
    }
  }

  return { message: 'Historical data migration completed successfully.', tables };
}
