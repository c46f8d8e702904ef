import path from 'node:path';

export type DbConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
};

export type S3Config = {
  region: string;
  bucket: string;
  accessKeyId: string | null;
  secretAccessKey: string | null;
};

export type AppConfig = {
  port: number;
  apiKey: string | null;
  database: DbConfig;
  backupDir: string;
  s3: S3Config;
  migrationChunkSize: number;
  batchMaxRows: number;
};

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function optional(value: string | undefined): string | null {
  return value && value.trim().length ? value : null;
}

export function getDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DbConfig {
  return {
    host: env.POSTGRES_HOST || 'localhost',
    port: positiveInt(env.POSTGRES_PORT, 5432),
    user: env.POSTGRES_USER || 'workforce',
    password: env.POSTGRES_PASSWORD || 'workforce',
    database: env.POSTGRES_DB || 'workforce',
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: positiveInt(env.API_PORT, 8080),
    apiKey: optional(env.API_KEY),
    database: getDatabaseConfig(env),
    backupDir: env.BACKUP_PATH ? path.resolve(env.BACKUP_PATH) : path.resolve(process.cwd(), 'backups'),
    s3: {
      region: env.S3_REGION || 'us-east-1',
      bucket: env.S3_BUCKET_NAME || 'workforce-raw-data',
      accessKeyId: optional(env.AWS_ACCESS_KEY_ID),
      secretAccessKey: optional(env.AWS_SECRET_ACCESS_KEY),
    },
    migrationChunkSize: positiveInt(env.MIGRATION_CHUNK_SIZE, 10000),
    batchMaxRows: positiveInt(env.BATCH_MAX_ROWS, 1000),
  };
}
