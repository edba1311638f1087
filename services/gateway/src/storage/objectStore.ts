import { PutObjectCommand, S3Client, type ObjectCannedACL } from '@aws-sdk/client-s3';

import type { StorageConfig } from '../config';
import { GatewayError } from '../errors';

export interface PutObjectInput {
  key: string;
  body: Uint8Array;
  contentType: string;
}

export interface StoredObject {
  key: string;
  url: string;
}

/** Write-only view of the public bucket used for artifacts and uploads. */
export interface ObjectStore {
  putPublicObject(input: PutObjectInput): Promise<StoredObject>;
  publicUrlFor(key: string): string;
  close(): Promise<void>;
}

const CONTENT_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  gif: 'image/gif',
  bmp: 'image/bmp',
  svg: 'image/svg+xml'
};

export function contentTypeForExtension(extension: string): string {
  const normalized = extension.toLowerCase();
  return Object.prototype.hasOwnProperty.call(CONTENT_TYPES, normalized)
    ? CONTENT_TYPES[normalized]
    : 'application/octet-stream';
}

export function joinPublicUrl(publicBaseUrl: string, key: string): string {
  return `${publicBaseUrl.replace(/\/+$/, '')}/${encodeURIComponent(key)}`;
}

export type S3ObjectStoreOptions = Pick<
  StorageConfig,
  'endpoint' | 'region' | 'bucket' | 'publicBaseUrl' | 'accessKeyId' | 'secretAccessKey' | 'forcePathStyle'
> & {
  client?: S3Client;
};

export function createS3Client(options: S3ObjectStoreOptions): S3Client {
  return new S3Client({
    region: options.region,
    endpoint: options.endpoint ?? undefined,
    forcePathStyle: options.forcePathStyle,
    credentials:
      options.accessKeyId && options.secretAccessKey
        ? {
            accessKeyId: options.accessKeyId,
            secretAccessKey: options.secretAccessKey
          }
        : undefined
  });
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly publicBaseUrl: string;
  private readonly acl: ObjectCannedACL = 'public-read';
  private closed = false;

  constructor(options: S3ObjectStoreOptions) {
    this.client = options.client ?? createS3Client(options);
    this.bucket = options.bucket;
    this.publicBaseUrl = options.publicBaseUrl;
  }

  publicUrlFor(key: string): string {
    return joinPublicUrl(this.publicBaseUrl, key);
  }

  async putPublicObject(input: PutObjectInput): Promise<StoredObject> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: input.key,
          Body: input.body,
          ContentType: input.contentType,
          ACL: this.acl
        })
      );
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new GatewayError(`Failed to upload ${input.key} to object storage: ${reason}`, 'STORAGE_UPLOAD_FAILED', {
        bucket: this.bucket,
        key: input.key
      });
    }
    return { key: input.key, url: this.publicUrlFor(input.key) };
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.client.destroy();
  }
}
