export const STORAGE_TIERS = [
  'STANDARD',
  'STANDARD_IA',
  'ONEZONE_IA',
  'INTELLIGENT_TIERING',
  'GLACIER_IR',
  'GLACIER',
  'DEEP_ARCHIVE',
  'REDUCED_REDUNDANCY',
  'UNKNOWN'
] as const;

export type StorageTier = (typeof STORAGE_TIERS)[number];

/** Tiers an object may be transitioned into, in selector order. */
export const SELECTABLE_TIERS: readonly StorageTier[] = [
  'STANDARD',
  'STANDARD_IA',
  'ONEZONE_IA',
  'INTELLIGENT_TIERING',
  'GLACIER_IR',
  'GLACIER',
  'DEEP_ARCHIVE'
];

const TIER_LABELS: Record<StorageTier, string> = {
  STANDARD: 'Standard',
  STANDARD_IA: 'Standard-IA',
  ONEZONE_IA: 'One Zone-IA',
  INTELLIGENT_TIERING: 'Intelligent-Tiering',
  GLACIER_IR: 'Glacier Instant Retrieval',
  GLACIER: 'Glacier Flexible Retrieval',
  DEEP_ARCHIVE: 'Glacier Deep Archive',
  REDUCED_REDUNDANCY: 'Reduced Redundancy',
  UNKNOWN: 'Unknown'
};

export function tierLabel(tier: StorageTier): string {
  return TIER_LABELS[tier];
}

export function isStorageTier(value: string): value is StorageTier {
  return STORAGE_TIERS.some((tier) => tier === value);
}

export function isSelectableTier(tier: StorageTier): boolean {
  return SELECTABLE_TIERS.includes(tier);
}

/**
 * Maps a backend storage-class string onto the tier catalogue. HEAD responses omit the
 * class for Standard objects, so an absent value is Standard.
 */
export function tierFromStorageClass(raw: string | null | undefined): StorageTier {
  if (!raw) {
    return 'STANDARD';
  }
  const normalized = raw.trim().toUpperCase();
  if (normalized === 'UNKNOWN' || !isStorageTier(normalized)) {
    return 'UNKNOWN';
  }
  return normalized;
}
