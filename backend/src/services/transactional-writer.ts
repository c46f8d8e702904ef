import { TABLE_COLUMNS, type InsertedCounts, type RowOf, type TableName } from '../domain/entities.js';
import { constraintViolation, infrastructureFault, IngestionError, type ErrorDetails } from '../errors.js';
import type { Session } from '../store/session.js';
import { createLogger } from '../utils/logger.js';
import type { ValidatedBatch } from './batch-validator.js';

const logger = createLogger('writer');

export const DEFAULT_CHUNK_SIZE = 1000;

// Bind parameters one PostgreSQL statement can carry.
export const MAX_BIND_PARAMETERS = 65535;

export function effectiveChunkSize(table: TableName, requested: number): number {
  const ceiling = Math.floor(MAX_BIND_PARAMETERS / TABLE_COLUMNS[table].length);
  return Math.min(ceiling, Math.max(1, Math.floor(requested)));
}

type PgError = Error & { code: string; detail?: string; constraint?: string };

function isPgError(error: unknown): error is PgError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

// SQLSTATE class 23: unique, foreign key, not-null and check violations.
export function isConstraintViolation(error: unknown): error is PgError {
  return isPgError(error) && error.code.startsWith('23');
}

/**
 * Decides the error kind of a store failure. Engine errors pass through
 * untouched; anything unexpected is logged in full and replaced by an opaque
 * infrastructure fault.
 */
export function classifyStoreError(error: unknown, context: ErrorDetails = {}): IngestionError {
  if (error instanceof IngestionError) {
    return error.withDetails(context);
  }

  if (isConstraintViolation(error)) {
    logger.warn(`Database constraint error: ${error.message}`, context);
    return constraintViolation('Database constraint error. Ensure unique department, job and employee IDs.', {
      ...context,
      constraint: error.constraint ?? null,
      detail: error.detail ?? null,
    });
  }

  logger.error('Unexpected store error', error);
  return infrastructureFault('Failed to write to the database.', context);
}

export type LoadOptions = {
  chunkSize?: number;
  context?: ErrorDetails;
};

/**
 * Appends rows of one entity through the caller's session, a chunk per
 * statement. Chunks are capped so a statement never exceeds the bind parameter
 * limit. The caller owns the transaction, so a failing chunk undoes the
 * earlier ones as well.
 */
export async function loadRows<T extends TableName>(
  session: Session,
  table: T,
  rows: readonly RowOf<T>[],
  { chunkSize = DEFAULT_CHUNK_SIZE, context = {} }: LoadOptions = {}
): Promise<number> {
  const size = effectiveChunkSize(table, chunkSize);
  let loaded = 0;

  try {
    for (let start = 0; start < rows.length; start += size) {
      loaded += await session.insertRows(table, rows.slice(start, start + size));
    }
  } catch (error) {
    throw classifyStoreError(error, { table, loaded, ...context });
  }

  return loaded;
}

/**
 * Inserts a validated batch in dependency order: departments, jobs, then the
 * employees that reference them.
 */
export async function writeBatch(session: Session, batch: ValidatedBatch): Promise<InsertedCounts> {
  const departments = await loadRows(session, 'departments', batch.departments);
  if (departments) logger.info(`Inserted ${departments} new departments.`);

  const jobs = await loadRows(session, 'jobs', batch.jobs);
  if (jobs) logger.info(`Inserted ${jobs} new jobs.`);

  const hiredEmployees = await loadRows(session, 'hired_employees', batch.hired_employees);
  if (hiredEmployees) logger.info(`Inserted ${hiredEmployees} new hired employees.`);

  return { departments, jobs, hired_employees: hiredEmployees };
}
