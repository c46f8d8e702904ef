import { describe, expect, it } from 'vitest';
import { validateBatch, type BatchInput } from '../src/services/batch-validator.js';

function examplePayload(departmentId = 10): BatchInput {
  return {
    departments: [{ id: 10, name: 'Eng' }],
    jobs: [{ id: 20, name: 'SWE' }],
    hired_employees: [{ id: 1, name: 'A', datetime: '2021-02-10T00:00:00Z', department_id: departmentId, job_id: 20 }],
  };
}

describe('validateBatch', () => {
  it('accepts a batch whose references resolve inside the batch', () => {
    const result = validateBatch(new Set(), new Set(), examplePayload());

    expect(result).toEqual({
      ok: true,
      batch: {
        departments: [{ id: 10, name: 'Eng' }],
        jobs: [{ id: 20, name: 'SWE' }],
        hired_employees: [
          { id: 1, name: 'A', datetime: new Date('2021-02-10T00:00:00Z'), department_id: 10, job_id: 20 },
        ],
      },
    });
  });

  it('rejects a department reference that resolves nowhere', () => {
    expect(validateBatch(new Set(), new Set(), examplePayload(99))).toEqual({
      ok: false,
      violations: ['Department ID 99 does not exist and is not in the new departments list.'],
    });
  });

  it('resolves references against existing ids', () => {
    const result = validateBatch(new Set([5]), new Set([6]), {
      departments: [],
      jobs: [],
      hired_employees: [{ id: 2, name: 'B', datetime: '2021-03-01T10:00:00Z', department_id: 5, job_id: 6 }],
    });

    expect(result.ok).toBe(true);
  });

  it('collects every violation instead of stopping at the first', () => {
    const result = validateBatch(new Set([10]), new Set(), {
      departments: [{ id: 10, name: 'Eng' }, { id: 'x', name: '' }],
      jobs: [
        { id: 20, name: 'SWE' },
        { id: 20, name: 'QA' },
      ],
      hired_employees: [
        { id: 1, name: 'A', datetime: 'soon', department_id: 10, job_id: 21 },
        { id: 1, name: ' ', datetime: 17, department_id: '10', job_id: null },
      ],
    });

    expect(result).toEqual({
      ok: false,
      violations: [
        'Department ID 10 already exists.',
        "Each department must have a valid 'id' (integer).",
        "Each department must have a valid 'name' (non-empty string).",
        'Job ID 20 is duplicated in the batch.',
        'Invalid datetime format: soon',
        'Job ID 21 does not exist and is not in the new jobs list.',
        'Hired employee ID 1 is duplicated in the batch.',
        "Each employee must have a valid 'name' (non-empty string).",
        "Each employee must have a valid 'datetime' (ISO format string).",
        "Each employee must have a valid 'department_id' (integer).",
        "Each employee must have a valid 'job_id' (integer).",
      ],
    });
  });

  it('requires at least one hired employee', () => {
    expect(validateBatch(new Set(), new Set(), { departments: [{ id: 1, name: 'Eng' }], jobs: [], hired_employees: [] })).toEqual({
      ok: false,
      violations: ['At least one hired employee is required.'],
    });
  });

  it('rejects ids outside the 32-bit range', () => {
    const result = validateBatch(new Set(), new Set(), {
      departments: [{ id: 2147483648, name: 'Eng' }],
      jobs: [],
      hired_employees: [{ id: 1.5, name: 'A', datetime: '2021-02-10T00:00:00Z', department_id: 1, job_id: 1 }],
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.violations.slice(0, 2)).toEqual([
        "Each department must have a valid 'id' (integer).",
        "Each employee must have a valid 'id' (integer).",
      ]);
    }
  });
});
