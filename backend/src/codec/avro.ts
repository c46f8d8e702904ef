import avro from 'avsc';
import type { Type } from 'avsc';
import { z } from 'zod';
import type { RowOf, TableName } from '../domain/entities.js';
import { formatTimestamp, parseIsoTimestamp } from './timestamps.js';

type SnapshotRecord = Record<string, string | number | null>;

export const SNAPSHOT_TYPES: Record<TableName, Type> = {
  departments: avro.Type.forSchema({
    type: 'record',
    name: 'Department',
    fields: [
      { name: 'id', type: 'int' },
      { name: 'name', type: 'string' },
    ],
  }),
  jobs: avro.Type.forSchema({
    type: 'record',
    name: 'Job',
    fields: [
      { name: 'id', type: 'int' },
      { name: 'name', type: 'string' },
    ],
  }),
  hired_employees: avro.Type.forSchema({
    type: 'record',
    name: 'HiredEmployee',
    fields: [
      { name: 'id', type: 'int' },
      { name: 'name', type: ['null', 'string'] },
      { name: 'datetime', type: ['null', 'string'] },
      { name: 'department_id', type: ['null', 'int'] },
      { name: 'job_id', type: ['null', 'int'] },
    ],
  }),
};

const catalogRecordSchema = z.object({ id: z.number().int(), name: z.string() });

// Legacy snapshots may carry timestamps that no longer parse; those stay as text.
const SNAPSHOT_SCHEMAS: { [T in TableName]: z.ZodType<RowOf<T>, z.ZodTypeDef, unknown> } = {
  departments: catalogRecordSchema,
  jobs: catalogRecordSchema,
  hired_employees: z.object({
    id: z.number().int(),
    name: z.string().nullable(),
    datetime: z
      .string()
      .nullable()
      .transform((value) => (value === null ? null : parseIsoTimestamp(value) ?? value)),
    department_id: z.number().int().nullable(),
    job_id: z.number().int().nullable(),
  }),
};

const SNAPSHOT_WRITERS: { [T in TableName]: (row: RowOf<T>) => SnapshotRecord } = {
  departments: (row) => ({ id: row.id, name: row.name }),
  jobs: (row) => ({ id: row.id, name: row.name }),
  hired_employees: (row) => ({
    id: row.id,
    name: row.name,
    datetime: row.datetime instanceof Date ? formatTimestamp(row.datetime) : row.datetime,
    department_id: row.department_id,
    job_id: row.job_id,
  }),
};

/**
 * Encodes a table's rows as an Avro object container file. The writer schema
 * travels in the container header.
 */
export async function encodeSnapshot<T extends TableName>(table: T, rows: readonly RowOf<T>[]): Promise<Buffer> {
  const encoder = new avro.streams.BlockEncoder(SNAPSHOT_TYPES[table]);
  const toRecord = SNAPSHOT_WRITERS[table];
  const chunks: Buffer[] = [];

  const finished = new Promise<void>((resolve, reject) => {
    encoder.on('data', (chunk: Buffer) => chunks.push(chunk));
    encoder.on('end', resolve);
    encoder.on('error', reject);
  });

  for (const row of rows) {
    encoder.write(toRecord(row));
  }
  encoder.end();

  await finished;
  return Buffer.concat(chunks);
}

export async function decodeSnapshot<T extends TableName>(table: T, bytes: Buffer): Promise<RowOf<T>[]> {
  const decoder = new avro.streams.BlockDecoder();
  const records: unknown[] = [];

  const finished = new Promise<void>((resolve, reject) => {
    decoder.on('data', (record: unknown) => records.push(record));
    decoder.on('end', resolve);
    decoder.on('error', reject);
  });

  decoder.end(bytes);
  await finished;

  const schema = SNAPSHOT_SCHEMAS[table];
  return records.map((record) => schema.parse(record));
}
