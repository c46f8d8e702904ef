import { GetObjectCommand, NoSuchKey, S3Client } from '@aws-sdk/client-s3';
import type { S3Config } from '../config.js';

export interface ObjectStorage {
  /** Decoded UTF-8 text of the object, or null when the key does not exist. */
  getText(key: string): Promise<string | null>;
}

export class S3ObjectStorage implements ObjectStorage {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string
  ) {}

  async getText(key: string): Promise<string | null> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) return null;
      return await response.Body.transformToString('utf-8');
    } catch (error) {
      if (error instanceof NoSuchKey) return null;
      throw error;
    }
  }
}

export function createS3ObjectStorage(config: S3Config): S3ObjectStorage {
  const client = new S3Client({
    region: config.region,
    ...(config.accessKeyId && config.secretAccessKey
      ? { credentials: { accessKeyId: config.accessKeyId, secretAccessKey: config.secretAccessKey } }
      : {}),
  });
  return new S3ObjectStorage(client, config.bucket);
}
