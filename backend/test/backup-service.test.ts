import { describe, expect, it } from 'vitest';
import { decodeSnapshot, encodeSnapshot } from '../src/codec/avro.js';
import { createBackup, listBackups, restoreTable } from '../src/services/backup-service.js';
import { ingestionFailure } from './support/failure.js';
import { MemorySessionProvider } from './support/memory-session.js';
import { MemoryArtifactStore } from './support/memory-storage.js';

const departments = [
  { id: 1, name: 'Product Management' },
  { id: 2, name: 'Sales' },
];

const hired = [
  { id: 5, name: 'Ada', datetime: new Date('2021-02-10T08:30:15Z'), department_id: 1, job_id: null },
];

describe('createBackup', () => {
  it('writes one artifact per non-empty table', async () => {
    const sessions = new MemorySessionProvider({ departments, hired_employees: hired });
    const artifacts = new MemoryArtifactStore();

    const summary = await createBackup({ sessions, artifacts });

    expect(summary).toEqual({
      message: 'Database backup completed successfully!',
      tables: { departments: 2, jobs: 'skipped', hired_employees: 1 },
    });
    expect([...artifacts.files.keys()]).toEqual(['departments', 'hired_employees']);

    const stored = artifacts.files.get('hired_employees');
    expect(stored).toBeDefined();
    if (stored) {
      expect(await decodeSnapshot('hired_employees', stored)).toEqual(hired);
    }
  });

  it('reads all tables in a single transaction', async () => {
    const sessions = new MemorySessionProvider({ departments });

    await createBackup({ sessions, artifacts: new MemoryArtifactStore() });

    expect(sessions.commits).toBe(1);
    expect(sessions.calls).toEqual(['selectAll:departments', 'selectAll:jobs', 'selectAll:hired_employees']);
  });

  it('reports a store failure as an infrastructure fault', async () => {
    const sessions = new MemorySessionProvider({ departments });
    sessions.failNext('selectAll', 'jobs', new Error('connection terminated'));
    const artifacts = new MemoryArtifactStore();

    const error = await ingestionFailure(createBackup({ sessions, artifacts }));

    expect(error.kind).toBe('infrastructure_fault');
    expect(error.message).toBe('Failed to create a new backup for the database.');
    expect(artifacts.files.size).toBe(0);
  });
});

class FailingArtifactStore extends MemoryArtifactStore {
  constructor(private readonly failingTable: string) {
    super();
  }

  async write(table: Parameters<MemoryArtifactStore['write']>[0], bytes: Buffer): Promise<void> {
    if (table === this.failingTable) throw new Error('disk full');
    await super.write(table, bytes);
  }
}

describe('createBackup partial failure', () => {
  it('names the artifacts already rewritten', async () => {
    const sessions = new MemorySessionProvider({ departments, hired_employees: hired });
    const artifacts = new FailingArtifactStore('hired_employees');

    const error = await ingestionFailure(createBackup({ sessions, artifacts }));

    expect(error.kind).toBe('infrastructure_fault');
    expect(error.details).toEqual({ completed: ['departments'] });
    expect([...artifacts.files.keys()]).toEqual(['departments']);
  });
});

describe('listBackups', () => {
  it('lists stored artifacts', async () => {
    const artifacts = new MemoryArtifactStore();
    artifacts.files.set('jobs', Buffer.from('abc'));

    expect(await listBackups({ artifacts })).toEqual([
      { table: 'jobs', filename: 'jobs.avro', sizeBytes: 3, modifiedAt: '2024-01-01T00:00:00.000Z' },
    ]);
  });
});

describe('restoreTable', () => {
  it('replaces the table content with the snapshot', async () => {
    const sessions = new MemorySessionProvider({ departments: [{ id: 9, name: 'Temp' }], jobs: [{ id: 1, name: 'SWE' }] });
    const artifacts = new MemoryArtifactStore();
    artifacts.files.set('departments', await encodeSnapshot('departments', departments));

    const result = await restoreTable({ sessions, artifacts }, 'departments');

    expect(result).toEqual({ message: 'Successfully restored 2 records to departments.', table: 'departments', restored: 2 });
    expect(sessions.tables.departments).toEqual(departments);
    expect(sessions.tables.jobs).toEqual([{ id: 1, name: 'SWE' }]);
    expect(sessions.calls).toEqual(['truncate:departments', 'insertRows:departments:2']);
  });

  it('fails with not found and leaves the table untouched when no artifact exists', async () => {
    const sessions = new MemorySessionProvider({ jobs: [{ id: 1, name: 'SWE' }] });

    const error = await ingestionFailure(restoreTable({ sessions, artifacts: new MemoryArtifactStore() }, 'jobs'));

    expect(error.kind).toBe('not_found');
    expect(error.statusCode).toBe(404);
    expect(error.message).toBe("Backup file for table 'jobs' not found.");
    expect(error.details).toEqual({ table: 'jobs' });
    expect(sessions.tables.jobs).toEqual([{ id: 1, name: 'SWE' }]);
    expect(sessions.calls).toEqual([]);
  });

  it('rejects an unknown table name', async () => {
    const error = await ingestionFailure(
      restoreTable({ sessions: new MemorySessionProvider(), artifacts: new MemoryArtifactStore() }, 'payroll')
    );

    expect(error.kind).toBe('unrecognized_resource');
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe("Table 'payroll' is not recognized.");
  });

  it('undoes the truncate when the reload fails', async () => {
    const sessions = new MemorySessionProvider({ departments: [{ id: 9, name: 'Temp' }] });
    sessions.failNext('insertRows', 'departments', new Error('connection reset'));
    const artifacts = new MemoryArtifactStore();
    artifacts.files.set('departments', await encodeSnapshot('departments', departments));

    const error = await ingestionFailure(restoreTable({ sessions, artifacts }, 'departments'));

    expect(error.kind).toBe('infrastructure_fault');
    expect(error.details).toEqual({ table: 'departments', loaded: 0, stage: 'load' });
    expect(sessions.tables.departments).toEqual([{ id: 9, name: 'Temp' }]);
    expect(sessions.rollbacks).toBe(1);
  });

  it('reports a failed truncate with its stage', async () => {
    const sessions = new MemorySessionProvider();
    sessions.failNext('truncate', 'jobs', new Error('lock timeout'));
    const artifacts = new MemoryArtifactStore();
    artifacts.files.set('jobs', await encodeSnapshot('jobs', [{ id: 1, name: 'SWE' }]));

    const error = await ingestionFailure(restoreTable({ sessions, artifacts }, 'jobs'));

    expect(error.kind).toBe('infrastructure_fault');
    expect(error.details).toEqual({ table: 'jobs', stage: 'truncate' });
  });

  it('reports an unreadable artifact', async () => {
    const artifacts = new MemoryArtifactStore();
    artifacts.files.set('jobs', Buffer.from('corrupted'));

    const error = await ingestionFailure(restoreTable({ sessions: new MemorySessionProvider(), artifacts }, 'jobs'));

    expect(error.kind).toBe('infrastructure_fault');
    expect(error.details).toEqual({ table: 'jobs', stage: 'decode' });
  });
});
