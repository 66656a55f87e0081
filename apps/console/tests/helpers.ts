import path from 'node:path';
import { tmpdir } from 'node:os';
import { mkdtemp } from 'node:fs/promises';
import type { BucketInfo, ObjectInfo, StorageBackend } from '@tierdeck/core';

export async function createTempDir(prefix = 'tierdeck-console-test-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export function createStaticBackend(buckets: BucketInfo[], objects: ObjectInfo[] = []): StorageBackend {
  return {
    listBuckets: async () => buckets.map((bucket) => ({ ...bucket })),
    listObjects: async () => objects.map((object) => ({ ...object })),
    refreshObject: async (_bucket, key) => {
      const found = objects.find((object) => object.key === key);
      if (!found) {
        throw new Error(`missing ${key}`);
      }
      return { ...found };
    },
    transitionStorageClass: async () => undefined,
    requestRestore: async () => undefined
  };
}
