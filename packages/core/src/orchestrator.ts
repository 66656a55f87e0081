import type { CoreLogger, StorageBackend } from './backend';
import { noopLogger } from './backend';
import { ValidationError, assertUnreachable, classifyFailure, describeFailure, type FailureClassification } from './errors';
import { DEFAULT_RESTORE_DAYS, type PendingAction } from './machine';
import { toMaskDefinition } from './mask';
import type { MigrationPolicy } from './policySchema';
import type { PolicyStore } from './policyStore';
import { maskApplicationMessage, type SelectionModel } from './selection';
import { tierLabel, type StorageTier } from './storageTiers';

export interface StatusSink {
  push(message: string): void;
}

export type KeyFailure = {
  key: string;
  stage: 'restore' | 'transition';
  classification: FailureClassification;
};

export type ExecutionOutcome =
  | { type: 'transition'; targetTier: StorageTier; succeeded: string[]; failed: KeyFailure[] }
  | { type: 'restore'; days: number; succeeded: string[]; failed: KeyFailure[] }
  | { type: 'savePolicy'; policy: MigrationPolicy | null }
  | { type: 'rejected'; reason: string };

export interface MigrationOrchestratorOptions {
  backend: StorageBackend;
  selection: SelectionModel;
  policyStore: PolicyStore;
  status: StatusSink;
  logger?: CoreLogger;
}

const compareByName = (a: { name: string }, b: { name: string }) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);
const compareByKey = (a: { key: string }, b: { key: string }) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0);

/**
 * Runs confirmed actions against the storage backend. Keys are processed one at a time and
 * a failure on one key never stops the rest of the batch.
 */
export class MigrationOrchestrator {
  private readonly backend: StorageBackend;
  private readonly selection: SelectionModel;
  private readonly policyStore: PolicyStore;
  private readonly status: StatusSink;
  private readonly logger: CoreLogger;

  constructor(options: MigrationOrchestratorOptions) {
    this.backend = options.backend;
    this.selection = options.selection;
    this.policyStore = options.policyStore;
    this.status = options.status;
    this.logger = options.logger ?? noopLogger;
  }

  async refreshBuckets(): Promise<void> {
    const buckets = await this.backend.listBuckets();
    const sorted = [...buckets].sort(compareByName);
    this.selection.setBuckets(sorted);
    this.logger.info({ count: sorted.length }, 'buckets loaded');
  }

  async loadObjects(): Promise<void> {
    const bucket = this.selection.selectedBucketName();
    if (!bucket) {
      return;
    }
    const objects = await this.backend.listObjects(bucket);
    const sorted = [...objects].sort(compareByKey);
    this.selection.setObjects(bucket, sorted);
    const mask = this.selection.activeMask;
    if (mask) {
      this.status.push(maskApplicationMessage(this.selection.applyMask(mask)));
    }
    this.status.push(`Loaded objects for bucket ${bucket}`);
    this.logger.info({ bucket, count: sorted.length }, 'objects loaded');
  }

  async inspectObject(): Promise<void> {
    const bucket = this.selection.selectedBucketName();
    if (!bucket) {
      throw new ValidationError('Select a bucket first');
    }
    const selected = this.selection.loadedBucket === bucket ? this.selection.selectedObject() : undefined;
    if (!selected) {
      throw new ValidationError('Select an object to inspect');
    }
    const refreshed = await this.backend.refreshObject(bucket, selected.key);
    this.selection.replaceObject(refreshed);
    this.status.push('Object metadata refreshed');
    this.logger.debug({ bucket, key: selected.key, tier: refreshed.storageTier }, 'object refreshed');
  }

  async execute(action: PendingAction): Promise<ExecutionOutcome> {
    switch (action.type) {
      case 'transition':
        return this.executeTransition(action.targetTier, action.restoreFirst);
      case 'restore':
        return this.executeRestore(action.days);
      case 'savePolicy':
        return this.savePolicy(action.targetTier);
      default:
        return assertUnreachable(action);
    }
  }

  private reject(reason: string): ExecutionOutcome {
    this.status.push(reason);
    return { type: 'rejected', reason };
  }

  private recordFailure(failure: KeyFailure, bucket: string): void {
    const label = failure.stage === 'restore' ? 'Restore' : 'Transition';
    this.status.push(`${label} failed for ${failure.key}: ${describeFailure(failure.classification)}`);
    this.logger.warn(
      { bucket, key: failure.key, stage: failure.stage, category: failure.classification.category },
      `${failure.stage} failed`
    );
  }

  private async executeTransition(targetTier: StorageTier, restoreFirst: boolean): Promise<ExecutionOutcome> {
    const bucket = this.selection.selectedBucketName();
    if (!bucket) {
      return this.reject('Select a bucket before transitioning');
    }
    const keys = this.selection.targetKeys();
    if (keys.length === 0) {
      this.status.push('No objects selected for transition');
      return { type: 'transition', targetTier, succeeded: [], failed: [] };
    }

    const succeeded: string[] = [];
    const failed: KeyFailure[] = [];
    for (const key of keys) {
      if (restoreFirst) {
        // Restore-first always asks for the default duration; the configured days apply to restore actions.
        try {
          await this.backend.requestRestore(bucket, key, DEFAULT_RESTORE_DAYS);
        } catch (error) {
          const failure: KeyFailure = { key, stage: 'restore', classification: classifyFailure(error) };
          failed.push(failure);
          this.recordFailure(failure, bucket);
          continue;
        }
      }
      try {
        await this.backend.transitionStorageClass(bucket, key, targetTier);
        succeeded.push(key);
        this.status.push(`Transitioned ${key} to ${tierLabel(targetTier)}`);
        this.logger.info({ bucket, key, tier: targetTier, restoreFirst }, 'object transitioned');
      } catch (error) {
        const failure: KeyFailure = { key, stage: 'transition', classification: classifyFailure(error) };
        failed.push(failure);
        this.recordFailure(failure, bucket);
      }
    }

    try {
      await this.loadObjects();
    } catch (error) {
      this.status.push(`Failed to reload objects: ${describeFailure(classifyFailure(error))}`);
    }
    return { type: 'transition', targetTier, succeeded, failed };
  }

  private async executeRestore(days: number): Promise<ExecutionOutcome> {
    const bucket = this.selection.selectedBucketName();
    if (!bucket) {
      return this.reject('Select a bucket before restoring');
    }
    const succeeded: string[] = [];
    const failed: KeyFailure[] = [];
    for (const key of this.selection.targetKeys()) {
      try {
        await this.backend.requestRestore(bucket, key, days);
        succeeded.push(key);
        this.status.push(`Restore requested for ${key}`);
        this.logger.info({ bucket, key, days }, 'restore requested');
      } catch (error) {
        const failure: KeyFailure = { key, stage: 'restore', classification: classifyFailure(error) };
        failed.push(failure);
        this.recordFailure(failure, bucket);
      }
    }
    return { type: 'restore', days, succeeded, failed };
  }

  private async savePolicy(targetTier: StorageTier): Promise<ExecutionOutcome> {
    const bucket = this.selection.selectedBucketName();
    if (!bucket) {
      return this.reject('Select a bucket before saving policy');
    }
    const mask = this.selection.activeMask;
    if (!mask) {
      return this.reject('Apply a mask before saving policy');
    }
    try {
      const policy = await this.policyStore.add({
        bucket,
        mask: toMaskDefinition(mask),
        targetTier,
        scheduled: false,
        schedule: null
      });
      this.status.push('Policy saved');
      this.logger.info({ bucket, mask: mask.name, tier: targetTier, policyId: policy.id }, 'policy saved');
      return { type: 'savePolicy', policy };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.status.push(`Failed to save policy: ${detail}`);
      this.logger.error({ bucket, mask: mask.name, err: detail }, 'policy save failed');
      return { type: 'savePolicy', policy: null };
    }
  }
}
