import {
  CopyObjectCommand,
  GetBucketLocationCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  MetadataDirective,
  RestoreObjectCommand,
  S3Client,
  StorageClass
} from '@aws-sdk/client-s3';
import {
  ValidationError,
  decodeRestoreState,
  noopLogger,
  tierFromStorageClass,
  tierLabel,
  type BucketInfo,
  type CoreLogger,
  type ObjectInfo,
  type StorageBackend,
  type StorageTier
} from '@tierdeck/core';
import type { ConsoleConfig } from './config';
import { withBackendErrors } from './s3Errors';

const TRANSITION_STORAGE_CLASSES: Partial<Record<StorageTier, StorageClass>> = {
  STANDARD: StorageClass.STANDARD,
  STANDARD_IA: StorageClass.STANDARD_IA,
  ONEZONE_IA: StorageClass.ONEZONE_IA,
  INTELLIGENT_TIERING: StorageClass.INTELLIGENT_TIERING,
  GLACIER_IR: StorageClass.GLACIER_IR,
  GLACIER: StorageClass.GLACIER,
  DEEP_ARCHIVE: StorageClass.DEEP_ARCHIVE
};

export function createS3Client(config: ConsoleConfig['s3']): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
    maxAttempts: 1,
    requestHandler: {
      requestTimeout: config.requestTimeoutMs,
      connectionTimeout: config.requestTimeoutMs
    }
  });
}

function toIsoString(value: Date | undefined): string | undefined {
  return value ? value.toISOString() : undefined;
}

/** Storage backend over the S3 API. Every client failure surfaces as a classified error. */
export class S3StorageBackend implements StorageBackend {
  private readonly client: S3Client;
  private readonly logger: CoreLogger;

  constructor(client: S3Client, logger: CoreLogger = noopLogger) {
    this.client = client;
    this.logger = logger;
  }

  async listBuckets(): Promise<BucketInfo[]> {
    const response = await withBackendErrors(() => this.client.send(new ListBucketsCommand({})));
    const buckets: BucketInfo[] = [];
    for (const bucket of response.Buckets ?? []) {
      if (!bucket.Name) {
        continue;
      }
      buckets.push({
        name: bucket.Name,
        region: await this.resolveBucketRegion(bucket.Name),
        creationDate: toIsoString(bucket.CreationDate)
      });
    }
    return buckets.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  private async resolveBucketRegion(bucket: string): Promise<string | undefined> {
    try {
      const response = await this.client.send(new GetBucketLocationCommand({ Bucket: bucket }));
      return response.LocationConstraint || undefined;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.debug({ bucket, err: detail }, 'bucket region lookup failed');
      return undefined;
    }
  }

  async listObjects(bucket: string, prefix?: string): Promise<ObjectInfo[]> {
    const objects: ObjectInfo[] = [];
    let continuationToken: string | undefined;
    do {
      const response = await withBackendErrors(() =>
        this.client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            Prefix: prefix,
            ContinuationToken: continuationToken
          })
        )
      );
      for (const entry of response.Contents ?? []) {
        if (!entry.Key) {
          continue;
        }
        objects.push({
          key: entry.Key,
          size: entry.Size ?? 0,
          lastModified: toIsoString(entry.LastModified),
          storageTier: tierFromStorageClass(entry.StorageClass)
        });
      }
      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
    } while (continuationToken);

    this.logger.debug({ bucket, prefix, count: objects.length }, 'listed objects');
    return objects;
  }

  async refreshObject(bucket: string, key: string): Promise<ObjectInfo> {
    const head = await withBackendErrors(() => this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key })));
    return {
      key,
      size: head.ContentLength ?? 0,
      lastModified: toIsoString(head.LastModified),
      storageTier: tierFromStorageClass(head.StorageClass),
      restoreState: decodeRestoreState(head.Restore)
    };
  }

  /** Rewrites the object onto itself with the new storage class, keeping its metadata. */
  async transitionStorageClass(bucket: string, key: string, tier: StorageTier): Promise<void> {
    const storageClass = TRANSITION_STORAGE_CLASSES[tier];
    if (!storageClass) {
      throw new ValidationError(`${tierLabel(tier)} is not supported as a transition target`);
    }
    await withBackendErrors(() =>
      this.client.send(
        new CopyObjectCommand({
          Bucket: bucket,
          Key: key,
          CopySource: encodeURIComponent(`${bucket}/${key}`),
          StorageClass: storageClass,
          MetadataDirective: MetadataDirective.COPY
        })
      )
    );
  }

  async requestRestore(bucket: string, key: string, days: number): Promise<void> {
    await withBackendErrors(() =>
      this.client.send(
        new RestoreObjectCommand({
          Bucket: bucket,
          Key: key,
          RestoreRequest: { Days: days }
        })
      )
    );
  }
}
