import path from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtemp } from 'node:fs/promises';

import { BackendError } from '../src/errors';
import type { StorageBackend } from '../src/backend';
import type { StorageTier } from '../src/storageTiers';
import type { BucketInfo, ObjectInfo } from '../src/types';

export type BackendCall =
  | { op: 'listBuckets' }
  | { op: 'listObjects'; bucket: string }
  | { op: 'refreshObject'; bucket: string; key: string }
  | { op: 'transition'; bucket: string; key: string; tier: StorageTier }
  | { op: 'restore'; bucket: string; key: string; days: number };

type FailingOperation = 'transition' | 'restore' | 'refreshObject' | 'listObjects';

export class InMemoryBackend implements StorageBackend {
  readonly calls: BackendCall[] = [];
  private readonly failures = new Map<string, Error>();

  constructor(
    private readonly buckets: BucketInfo[],
    private readonly objects: Map<string, ObjectInfo[]> = new Map()
  ) {}

  failOn(op: FailingOperation, key: string, error: Error): void {
    this.failures.set(`${op}:${key}`, error);
  }

  private maybeFail(op: FailingOperation, key: string): void {
    const failure = this.failures.get(`${op}:${key}`);
    if (failure) {
      throw failure;
    }
  }

  async listBuckets(): Promise<BucketInfo[]> {
    this.calls.push({ op: 'listBuckets' });
    return this.buckets.map((bucket) => ({ ...bucket }));
  }

  async listObjects(bucket: string): Promise<ObjectInfo[]> {
    this.calls.push({ op: 'listObjects', bucket });
    this.maybeFail('listObjects', bucket);
    return (this.objects.get(bucket) ?? []).map((object) => ({ ...object }));
  }

  async refreshObject(bucket: string, key: string): Promise<ObjectInfo> {
    this.calls.push({ op: 'refreshObject', bucket, key });
    this.maybeFail('refreshObject', key);
    const found = (this.objects.get(bucket) ?? []).find((object) => object.key === key);
    if (!found) {
      throw new BackendError({ category: 'serviceRejected', code: 'NotFound', message: 'Not Found' });
    }
    return { ...found, restoreState: { kind: 'inProgress', expiry: null } };
  }

  async transitionStorageClass(bucket: string, key: string, tier: StorageTier): Promise<void> {
    this.calls.push({ op: 'transition', bucket, key, tier });
    this.maybeFail('transition', key);
    const list = this.objects.get(bucket) ?? [];
    this.objects.set(
      bucket,
      list.map((object) => (object.key === key ? { ...object, storageTier: tier } : object))
    );
  }

  async requestRestore(bucket: string, key: string, days: number): Promise<void> {
    this.calls.push({ op: 'restore', bucket, key, days });
    this.maybeFail('restore', key);
  }
}

export function object(key: string, storageTier: StorageTier = 'STANDARD', size = 1024): ObjectInfo {
  return { key, size, storageTier };
}

export async function createTempDir(prefix = 'tierdeck-core-test-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}
