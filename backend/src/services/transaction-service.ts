import type { InsertedCounts } from '../domain/entities.js';
import { malformedBatch, validationFailed } from '../errors.js';
import type { SessionProvider } from '../store/session.js';
import { createLogger } from '../utils/logger.js';
import { validateBatch, type BatchInput } from './batch-validator.js';
import { classifyStoreError, writeBatch } from './transactional-writer.js';

const logger = createLogger('transactions');

export const DEFAULT_BATCH_MAX_ROWS = 1000;

export type InsertTransactionsOptions = {
  maxRows?: number;
};

export function countBatchRows(input: BatchInput): number {
  return input.departments.length + input.jobs.length + input.hired_employees.length;
}

/**
 * Validates and inserts one batch as a single unit of work. The size check
 * runs before any session is opened; existing-id reads, validation and the
 * inserts share one transaction.
 */
export async function insertTransactions(
  sessions: SessionProvider,
  input: BatchInput,
  { maxRows = DEFAULT_BATCH_MAX_ROWS }: InsertTransactionsOptions = {}
): Promise<InsertedCounts> {
  const total = countBatchRows(input);
  if (total === 0 || total > maxRows) {
    throw malformedBatch(`Batch size must be between 1 and ${maxRows} rows.`, { total });
  }

  try {
    const inserted = await sessions.withTransaction(async (session) => {
      const existingDepartmentIds = await session.selectIds('departments');
      const existingJobIds = await session.selectIds('jobs');

      const result = validateBatch(existingDepartmentIds, existingJobIds, input);
      if (!result.ok) {
        logger.warn(`Batch rejected with ${result.violations.length} violation(s).`);
        throw validationFailed(result.violations);
      }

      return writeBatch(session, result.batch);
    });

    logger.info(
      `Inserted ${inserted.departments} departments, ${inserted.jobs} jobs, ${inserted.hired_employees} hired employees.`
    );
    return inserted;
  } catch (error) {
    throw classifyStoreError(error);
  }
}
