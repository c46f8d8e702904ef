import { decodeSnapshot, encodeSnapshot } from '../codec/avro.js';
import { TABLES, isTableName, type RowOf, type TableData, type TableName } from '../domain/entities.js';
import { IngestionError, infrastructureFault, notFound, unrecognizedResource } from '../errors.js';
import type { ArtifactInfo, ArtifactStore } from '../storage/artifact-store.js';
import type { Session, SessionProvider } from '../store/session.js';
import { createLogger } from '../utils/logger.js';
import { classifyStoreError, loadRows } from './transactional-writer.js';

const logger = createLogger('backup');

export type BackupDeps = {
  sessions: SessionProvider;
  artifacts: ArtifactStore;
  chunkSize?: number;
};

export type BackupSummary = {
  message: string;
  tables: Partial<Record<TableName, number | 'skipped'>>;
};

export type RestoreSummary = {
  message: string;
  table: TableName;
  restored: number;
};

async function readSnapshot(session: Session): Promise<TableData> {
  return {
    departments: await session.selectAll('departments'),
    jobs: await session.selectAll('jobs'),
    hired_employees: await session.selectAll('hired_employees'),
  };
}

async function backupTable<T extends TableName>(
  artifacts: ArtifactStore,
  table: T,
  rows: readonly RowOf<T>[]
): Promise<number | 'skipped'> {
  if (!rows.length) {
    logger.info(`No records found for table ${table}. Skipping backup.`);
    return 'skipped';
  }

  const bytes = await encodeSnapshot(table, rows);
  await artifacts.write(table, bytes);
  logger.info(`Backup for ${table} saved (${rows.length} records, ${bytes.length} bytes).`);
  return rows.length;
}

/**
 * Writes one snapshot artifact per table. All tables are read in one
 * transaction so the artifacts agree with each other. Artifacts already
 * rewritten when a later table fails are named in `details.completed`.
 */
export async function createBackup({ sessions, artifacts }: BackupDeps): Promise<BackupSummary> {
  logger.info('Starting database backup...');
  const completed: TableName[] = [];

  try {
    const snapshot = await sessions.withTransaction(readSnapshot);
    const tables: BackupSummary['tables'] = {};
    for (const table of TABLES) {
      const outcome = await backupTable(artifacts, table, snapshot[table]);
      tables[table] = outcome;
      if (outcome !== 'skipped') completed.push(table);
    }

    const message = 'Database backup completed successfully!';
    logger.info(message);
    return { message, tables };
  } catch (error) {
    if (error instanceof IngestionError) throw error.withDetails({ completed });
    logger.error('Backup failed', error);
    throw infrastructureFault('Failed to create a new backup for the database.', { completed });
  }
}

export async function listBackups({ artifacts }: Pick<BackupDeps, 'artifacts'>): Promise<ArtifactInfo[]> {
  return artifacts.list();
}

/**
 * Replaces a table's content with its snapshot artifact. The truncate and the
 * reload run in one transaction; a failure reports which of the two broke.
 */
export async function restoreTable(
  { sessions, artifacts, chunkSize }: BackupDeps,
  tableName: string
): Promise<RestoreSummary> {
  logger.info(`Starting restore for table: ${tableName}`);

  if (!isTableName(tableName)) {
    throw unrecognizedResource(`Table '${tableName}' is not recognized.`, { table: tableName });
  }
  const table = tableName;

  const bytes = await artifacts.read(table);
  if (!bytes) {
    throw notFound(`Backup file for table '${table}' not found.`, { table });
  }

  let rows: RowOf<typeof table>[];
  try {
    rows = await decodeSnapshot(table, bytes);
  } catch (error) {
    logger.error(`Backup file for table ${table} could not be decoded`, error);
    throw infrastructureFault(`Backup file for table '${table}' could not be decoded.`, { table, stage: 'decode' });
  }

  let restored: number;
  try {
    restored = await sessions.withTransaction(async (session) => {
      try {
        await session.truncate(table);
      } catch (error) {
        throw classifyStoreError(error, { table, stage: 'truncate' });
      }
      logger.info(`Table ${table} truncated before restore.`);

      return loadRows(session, table, rows, { chunkSize, context: { stage: 'load' } });
    });
  } catch (error) {
    throw classifyStoreError(error, { table });
  }

  const message = `Successfully restored ${restored} records to ${table}.`;
  logger.info(message);
  return { message, table, restored };
}
