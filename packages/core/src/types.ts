import type { StorageTier } from './storageTiers';

export type BucketInfo = {
  name: string;
  region?: string;
  creationDate?: string;
};

export type RestoreState =
  | { kind: 'available' }
  | { kind: 'expired' }
  | { kind: 'inProgress'; expiry: string | null };

export type ObjectInfo = {
  key: string;
  size: number;
  lastModified?: string;
  storageTier: StorageTier;
  restoreState?: RestoreState;
};
