import { z } from 'zod';

export const TABLES = ['departments', 'jobs', 'hired_employees'] as const;

export type TableName = (typeof TABLES)[number];

export type DepartmentRow = {
  id: number;
  name: string;
};

export type JobRow = {
  id: number;
  name: string;
};

/**
 * `datetime` is a `Date` once parsed; it stays text only when a restored
 * snapshot carried a value that no longer parses. `name` is only null for
 * historical rows exported without one.
 */
export type HiredEmployeeRow = {
  id: number;
  name: string | null;
  datetime: Date | string | null;
  department_id: number | null;
  job_id: number | null;
};

type RowMap = {
  departments: DepartmentRow;
  jobs: JobRow;
  hired_employees: HiredEmployeeRow;
};

export type RowOf<T extends TableName> = RowMap[T];

export type TableData = { [T in TableName]: RowOf<T>[] };

export type InsertedCounts = Record<TableName, number>;

export const TABLE_COLUMNS: { [T in TableName]: readonly (keyof RowOf<T> & string)[] } = {
  departments: ['id', 'name'],
  jobs: ['id', 'name'],
  hired_employees: ['id', 'name', 'datetime', 'department_id', 'job_id'],
};

export function isTableName(value: string): value is TableName {
  return TABLES.some((table) => table === value);
}

export function emptyTableData(): TableData {
  return { departments: [], jobs: [], hired_employees: [] };
}

const catalogRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

// Rows as the store hands them back; unknown columns are dropped.
export const ROW_SCHEMAS: { [T in TableName]: z.ZodType<RowOf<T>, z.ZodTypeDef, unknown> } = {
  departments: catalogRowSchema,
  jobs: catalogRowSchema,
  hired_employees: z.object({
    id: z.number().int(),
    name: z.string().nullable(),
    datetime: z.union([z.date(), z.string()]).nullable(),
    department_id: z.number().int().nullable(),
    job_id: z.number().int().nullable(),
  }),
};
