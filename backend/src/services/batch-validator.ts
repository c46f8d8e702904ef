import type { DepartmentRow, JobRow } from '../domain/entities.js';
import { parseIsoTimestamp } from '../codec/timestamps.js';

export type CandidateRow = Record<string, unknown>;

export type BatchInput = {
  departments: readonly CandidateRow[];
  jobs: readonly CandidateRow[];
  hired_employees: readonly CandidateRow[];
};

export type NewHiredEmployee = {
  id: number;
  name: string;
  datetime: Date;
  department_id: number;
  job_id: number;
};

export type ValidatedBatch = {
  departments: DepartmentRow[];
  jobs: JobRow[];
  hired_employees: NewHiredEmployee[];
};

export type ValidationResult = { ok: true; batch: ValidatedBatch } | { ok: false; violations: string[] };

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

type CatalogLabel = 'Department' | 'Job';

type CatalogCheck = {
  rows: { id: number; name: string }[];
  ids: Set<number>;
};

function checkCatalog(
  label: CatalogLabel,
  candidates: readonly CandidateRow[],
  existingIds: ReadonlySet<number>,
  violations: string[]
): CatalogCheck {
  const noun = label.toLowerCase();
  const rows: CatalogCheck['rows'] = [];
  const ids = new Set<number>();

  for (const candidate of candidates) {
    const { id, name } = candidate;

    if (!isInteger(id)) {
      violations.push(`Each ${noun} must have a valid 'id' (integer).`);
    }
    if (!isNonEmptyString(name)) {
      violations.push(`Each ${noun} must have a valid 'name' (non-empty string).`);
    }

    if (isInteger(id)) {
      if (existingIds.has(id)) {
        violations.push(`${label} ID ${id} already exists.`);
      } else if (ids.has(id)) {
        violations.push(`${label} ID ${id} is duplicated in the batch.`);
      }
      ids.add(id);
    }

    if (isInteger(id) && isNonEmptyString(name)) {
      rows.push({ id, name });
    }
  }

  return { rows, ids };
}

function resolves(id: number, existing: ReadonlySet<number>, incoming: ReadonlySet<number>): boolean {
  return existing.has(id) || incoming.has(id);
}

/**
 * Checks a batch against the ids already persisted and the ids the batch
 * itself introduces. Every violation is collected; nothing short-circuits.
 * Employee timestamps come back parsed in the validated batch.
 */
export function validateBatch(
  existingDepartmentIds: ReadonlySet<number>,
  existingJobIds: ReadonlySet<number>,
  input: BatchInput
): ValidationResult {
  const violations: string[] = [];

  const departments = checkCatalog('Department', input.departments, existingDepartmentIds, violations);
  const jobs = checkCatalog('Job', input.jobs, existingJobIds, violations);

  if (!input.hired_employees.length) {
    violations.push('At least one hired employee is required.');
  }

  const employees: NewHiredEmployee[] = [];
  const employeeIds = new Set<number>();

  for (const candidate of input.hired_employees) {
    const { id, name, datetime, department_id: departmentId, job_id: jobId } = candidate;
    let valid = true;

    if (!isInteger(id)) {
      violations.push("Each employee must have a valid 'id' (integer).");
      valid = false;
    } else if (employeeIds.has(id)) {
      violations.push(`Hired employee ID ${id} is duplicated in the batch.`);
      valid = false;
    } else {
      employeeIds.add(id);
    }

    if (!isNonEmptyString(name)) {
      violations.push("Each employee must have a valid 'name' (non-empty string).");
      valid = false;
    }

    let hiredAt: Date | null = null;
    if (typeof datetime !== 'string') {
      violations.push("Each employee must have a valid 'datetime' (ISO format string).");
      valid = false;
    } else {
      hiredAt = parseIsoTimestamp(datetime);
      if (!hiredAt) {
        violations.push(`Invalid datetime format: ${datetime}`);
        valid = false;
      }
    }

    if (!isInteger(departmentId)) {
      violations.push("Each employee must have a valid 'department_id' (integer).");
      valid = false;
    } else if (!resolves(departmentId, existingDepartmentIds, departments.ids)) {
      violations.push(`Department ID ${departmentId} does not exist and is not in the new departments list.`);
      valid = false;
    }

    if (!isInteger(jobId)) {
      violations.push("Each employee must have a valid 'job_id' (integer).");
      valid = false;
    } else if (!resolves(jobId, existingJobIds, jobs.ids)) {
      violations.push(`Job ID ${jobId} does not exist and is not in the new jobs list.`);
      valid = false;
    }

    if (valid && isInteger(id) && isNonEmptyString(name) && hiredAt && isInteger(departmentId) && isInteger(jobId)) {
      employees.push({ id, name, datetime: hiredAt, department_id: departmentId, job_id: jobId });
    }
  }

  if (violations.length) {
    return { ok: false, violations };
  }

  return {
    ok: true,
    batch: { departments: departments.rows, jobs: jobs.rows, hired_employees: employees },
  };
}
