import type { Mask } from './mask';
import type { BucketInfo, ObjectInfo } from './types';

export type SelectionPane = 'buckets' | 'objects';

export type MaskApplication = { mask: Mask; matched: number } | { mask: null };

/** Read-only view the interaction state machine uses to check preconditions. */
export interface SelectionView {
  readonly activeMask: Mask | null;
  selectedBucketName(): string | undefined;
  targetCount(): number;
}

function clampIndex(index: number, length: number): number {
  if (length === 0) {
    return 0;
  }
  return Math.min(Math.max(index, 0), length - 1);
}

export function maskApplicationMessage(application: MaskApplication): string {
  if (!application.mask) {
    return 'Cleared mask filter';
  }
  if (application.matched === 0) {
    return 'Mask applied but matched no objects';
  }
  return `Mask '${application.mask.name}' matched ${application.matched} objects`;
}

/**
 * Owns the bucket list, the unfiltered object list of the current bucket and the
 * mask-filtered subset, and decides which objects an operation targets.
 */
export class SelectionModel implements SelectionView {
  private bucketList: BucketInfo[] = [];
  private objectList: ObjectInfo[] = [];
  private objectsBucket: string | undefined;
  private filteredList: ObjectInfo[] = [];
  private mask: Mask | null = null;
  private bucketIndex = 0;
  private objectIndex = 0;

  get buckets(): readonly BucketInfo[] {
    return this.bucketList;
  }

  get objects(): readonly ObjectInfo[] {
    return this.objectList;
  }

  /** Bucket the object list was loaded from. */
  get loadedBucket(): string | undefined {
    return this.objectsBucket;
  }

  get filteredObjects(): readonly ObjectInfo[] {
    return this.filteredList;
  }

  get activeMask(): Mask | null {
    return this.mask;
  }

  get selectedBucketIndex(): number {
    return this.bucketIndex;
  }

  get selectedObjectIndex(): number {
    return this.objectIndex;
  }

  setBuckets(buckets: BucketInfo[]): void {
    this.bucketList = [...buckets];
    this.bucketIndex = 0;
  }

  setObjects(bucket: string, objects: ObjectInfo[]): void {
    this.objectsBucket = bucket;
    this.objectList = [...objects];
    this.filteredList = [];
    this.objectIndex = 0;
  }

  applyMask(mask: Mask | null): MaskApplication {
    this.mask = mask;
    if (!mask) {
      this.filteredList = [];
      return { mask: null };
    }
    this.filteredList = this.objectList.filter((object) => mask.matches(object.key));
    this.objectIndex = 0;
    return { mask, matched: this.filteredList.length };
  }

  activeObjects(): readonly ObjectInfo[] {
    return this.mask ? this.filteredList : this.objectList;
  }

  selectedBucketName(): string | undefined {
    return this.bucketList[this.bucketIndex]?.name;
  }

  selectedObject(): ObjectInfo | undefined {
    return this.activeObjects()[this.objectIndex];
  }

  private listMatchesSelectedBucket(): boolean {
    return this.objectsBucket !== undefined && this.objectsBucket === this.selectedBucketName();
  }

  /** Keys an operation acts on. Empty while the listing belongs to another bucket. */
  targetKeys(): string[] {
    if (!this.listMatchesSelectedBucket()) {
      return [];
    }
    if (this.mask) {
      return this.filteredList.map((object) => object.key);
    }
    const selected = this.objectList[this.objectIndex];
    return selected ? [selected.key] : [];
  }

  targetCount(): number {
    if (!this.listMatchesSelectedBucket()) {
      return 0;
    }
    if (this.mask) {
      return this.filteredList.length;
    }
    return this.objectIndex < this.objectList.length ? 1 : 0;
  }

  /**
   * Swaps in re-fetched metadata for one object. The filtered list is recomputed but the
   * selected index is kept (clamped), unlike a full mask application.
   */
  replaceObject(updated: ObjectInfo): boolean {
    const index = this.objectList.findIndex((object) => object.key === updated.key);
    if (index === -1) {
      return false;
    }
    this.objectList = this.objectList.map((object, position) => (position === index ? updated : object));
    const mask = this.mask;
    if (mask) {
      this.filteredList = this.objectList.filter((object) => mask.matches(object.key));
    }
    this.objectIndex = clampIndex(this.objectIndex, this.activeObjects().length);
    return true;
  }

  move(pane: SelectionPane, delta: number): void {
    if (pane === 'buckets') {
      if (this.bucketList.length === 0) {
        return;
      }
      this.bucketIndex = clampIndex(this.bucketIndex + delta, this.bucketList.length);
      return;
    }
    const length = this.activeObjects().length;
    if (length === 0) {
      return;
    }
    this.objectIndex = clampIndex(this.objectIndex + delta, length);
  }

  jump(pane: SelectionPane, to: 'start' | 'end'): void {
    const length = pane === 'buckets' ? this.bucketList.length : this.activeObjects().length;
    if (length === 0) {
      return;
    }
    const index = to === 'start' ? 0 : length - 1;
    if (pane === 'buckets') {
      this.bucketIndex = index;
    } else {
      this.objectIndex = index;
    }
  }
}
