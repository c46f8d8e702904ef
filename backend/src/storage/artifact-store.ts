import { promises as fsp } from 'node:fs';
import path from 'node:path';
import { TABLES, type TableName } from '../domain/entities.js';

export type ArtifactInfo = {
  table: TableName;
  filename: string;
  sizeBytes: number;
  modifiedAt: string;
};

/** One binary snapshot per table, addressed by table name. */
export interface ArtifactStore {
  read(table: TableName): Promise<Buffer | null>;
  write(table: TableName, bytes: Buffer): Promise<void>;
  list(): Promise<ArtifactInfo[]>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function artifactFilename(table: TableName): string {
  return `${table}.avro`;
}

export class FileArtifactStore implements ArtifactStore {
  constructor(private readonly directory: string) {}

  async ensureBackupDirectory(): Promise<string> {
    await fsp.mkdir(this.directory, { recursive: true });
    return this.directory;
  }

  async read(table: TableName): Promise<Buffer | null> {
    try {
      return await fsp.readFile(path.join(this.directory, artifactFilename(table)));
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  async write(table: TableName, bytes: Buffer): Promise<void> {
    const dir = await this.ensureBackupDirectory();
    const target = path.join(dir, artifactFilename(table));
    const partial = `${target}.partial`;
    await fsp.writeFile(partial, bytes);
    await fsp.rename(partial, target);
  }

  async list(): Promise<ArtifactInfo[]> {
    const artifacts: ArtifactInfo[] = [];
    for (const table of TABLES) {
      const filename = artifactFilename(table);
      try {
        const stats = await fsp.stat(path.join(this.directory, filename));
        artifacts.push({ table, filename, sizeBytes: stats.size, modifiedAt: stats.mtime.toISOString() });
      } catch (error) {
        if (!isMissingFile(error)) throw error;
      }
    }
    return artifacts;
  }
}
