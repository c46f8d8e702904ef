import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { TABLE_COLUMNS, type RowOf, type TableName } from '../domain/entities.js';
import { parseSnapshotTimestamp } from './timestamps.js';

type Cell = string | null;

type RowParser<T extends TableName> = (cells: readonly Cell[]) => RowOf<T> | string;

export class CsvTransformError extends Error {
  readonly table: TableName;
  readonly problems: string[];

  constructor(table: TableName, problems: string[]) {
    super(`Raw data for table '${table}' has ${problems.length} invalid row(s).`);
    this.table = table;
    this.problems = problems;
  }
}

const recordsSchema = z.array(z.array(z.string()));

const INTEGER_PATTERN = /^\s*-?\d+\s*$/;

function normalizeCell(value: string | undefined): Cell {
  if (value === undefined || value === '') return null;
  return value;
}

function toInteger(cell: Cell): number | null {
  if (cell === null || !INTEGER_PATTERN.test(cell)) return null;
  const parsed = Number(cell);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

function parseId(cell: Cell): number | string {
  return toInteger(cell) ?? `invalid id '${cell ?? ''}'`;
}

function parseCatalogRow(cells: readonly Cell[]): { id: number; name: string } | string {
  const id = parseId(cells[0]);
  if (typeof id === 'string') return id;
  const name = cells[1];
  if (name === null) return `missing name for id ${id}`;
  return { id, name };
}

const ROW_PARSERS: { [T in TableName]: RowParser<T> } = {
  departments: parseCatalogRow,
  jobs: parseCatalogRow,
  hired_employees: (cells) => {
    const [idCell, name, datetime, departmentId, jobId] = cells;
    const id = parseId(idCell);
    if (typeof id === 'string') return id;
    return {
      id,
      name,
      datetime: datetime === null ? null : parseSnapshotTimestamp(datetime),
      department_id: toInteger(departmentId),
      job_id: toInteger(jobId),
    };
  },
};

/**
 * Reads a headerless CSV export of one table. Columns are positional:
 * `id,name` for catalogs and `id,name,datetime,department_id,job_id` for
 * hired employees. Employee cells other than the id become null when absent
 * or unreadable; a row without a usable id, or a catalog row without a name,
 * is reported by position.
 */
export function parseTableCsv<T extends TableName>(table: T, text: string): RowOf<T>[] {
  const records = recordsSchema.parse(
    parse(text, {
      relax_column_count: true,
      skip_empty_lines: true,
      bom: true,
    })
  );

  const width = TABLE_COLUMNS[table].length;
  const parseRow = ROW_PARSERS[table];
  const rows: RowOf<T>[] = [];
  const problems: string[] = [];

  records.forEach((record, index) => {
    const cells = Array.from({ length: width }, (_, column) => normalizeCell(record[column]));
    const parsed = parseRow(cells);
    if (typeof parsed === 'string') {
      problems.push(`row ${index + 1}: ${parsed}`);
    } else {
      rows.push(parsed);
    }
  });

  if (problems.length) {
    throw new CsvTransformError(table, problems);
  }
  return rows;
}
