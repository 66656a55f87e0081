import type { StorageTier } from './storageTiers';
import type { BucketInfo, ObjectInfo } from './types';

/**
 * Remote object store consumed by the orchestrator. Implementations throw `BackendError`
 * with a classification for every remote failure.
 */
export interface StorageBackend {
  /** Buckets ordered by name. */
  listBuckets(): Promise<BucketInfo[]>;
  /** Every object under the prefix; pagination is handled by the implementation. */
  listObjects(bucket: string, prefix?: string): Promise<ObjectInfo[]>;
  refreshObject(bucket: string, key: string): Promise<ObjectInfo>;
  transitionStorageClass(bucket: string, key: string, tier: StorageTier): Promise<void>;
  requestRestore(bucket: string, key: string, days: number): Promise<void>;
}

/** Structured logger accepted by the core; a pino logger satisfies it. */
export interface CoreLogger {
  debug(payload: Record<string, unknown>, message: string): void;
  info(payload: Record<string, unknown>, message: string): void;
  warn(payload: Record<string, unknown>, message: string): void;
  error(payload: Record<string, unknown>, message: string): void;
}

export const noopLogger: CoreLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
