import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { PolicyStoreError, PolicyValidationError } from './errors';
import {
  POLICY_FILE_VERSION,
  migrationPolicySchema,
  newPolicyInputSchema,
  policyFileSchema,
  type MigrationPolicy,
  type NewPolicyInput,
  type PolicyFile
} from './policySchema';

const clone = <T>(value: T): T => structuredClone(value);

/** Durable append-only storage for policy records. */
export interface PolicyPersistence {
  loadAll(): Promise<MigrationPolicy[]>;
  append(record: MigrationPolicy): Promise<void>;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Keeps every policy in a single JSON document. Appends rewrite the document through a
 * temporary file and a rename so a crash never leaves a half-written file behind.
 */
export class JsonFilePolicyPersistence implements PolicyPersistence {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  getFilePath(): string {
    return this.filePath;
  }

  async loadAll(): Promise<MigrationPolicy[]> {
    const document = await this.readDocument();
    return document.policies;
  }

  async append(record: MigrationPolicy): Promise<void> {
    const document = await this.readDocument();
    const next: PolicyFile = {
      version: POLICY_FILE_VERSION,
      policies: [...document.policies, record]
    };
    await this.writeDocument(next);
  }

  private async readDocument(): Promise<PolicyFile> {
    let contents: string;
    try {
      contents = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return { version: POLICY_FILE_VERSION, policies: [] };
      }
      throw new PolicyStoreError(`Failed to read policy file ${this.filePath}: ${errorMessage(error)}`);
    }

    if (contents.trim().length === 0) {
      return { version: POLICY_FILE_VERSION, policies: [] };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      throw new PolicyValidationError(`Failed to parse policy file ${this.filePath}`, error);
    }

    const result = policyFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new PolicyValidationError(`Policy file ${this.filePath} failed validation`, result.error.format());
    }
    return result.data;
  }

  private async writeDocument(document: PolicyFile): Promise<void> {
    const directory = path.dirname(this.filePath);
    const tempPath = path.join(directory, `.${path.basename(this.filePath)}.${randomUUID()}.tmp`);
    try {
      await fs.mkdir(directory, { recursive: true });
      await fs.writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new PolicyStoreError(`Failed to write policy file ${this.filePath}: ${errorMessage(error)}`);
    }
  }
}

type PolicyStoreEvents = {
  'policy:added': [policy: MigrationPolicy];
  'policies:loaded': [policies: MigrationPolicy[]];
};

export interface PolicyStoreOptions {
  persistence: PolicyPersistence;
  now?: () => Date;
  generateId?: () => string;
}

/**
 * In-memory mirror of the persisted policies. Duplicate policies are allowed: the store is
 * an append log, not a keyed map.
 */
export class PolicyStore extends EventEmitter<PolicyStoreEvents> {
  private readonly persistence: PolicyPersistence;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private mirror: MigrationPolicy[] = [];
  private operationQueue: Promise<void> = Promise.resolve();
  private initialized = false;

  constructor(options: PolicyStoreOptions) {
    super();
    this.persistence = options.persistence;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  static fromFile(filePath: string): PolicyStore {
    return new PolicyStore({ persistence: new JsonFilePolicyPersistence(filePath) });
  }

  /** Loads persisted policies. Failures propagate; callers treat them as fatal. */
  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }
    const loaded = await this.persistence.loadAll();
    this.mirror = loaded.map((policy) => clone(policy));
    this.initialized = true;
    this.emit('policies:loaded', this.list());
  }

  list(): MigrationPolicy[] {
    return this.mirror.map((policy) => clone(policy));
  }

  get size(): number {
    return this.mirror.length;
  }

  async add(input: NewPolicyInput): Promise<MigrationPolicy> {
    this.ensureInitialized();
    return this.enqueue(async () => {
      const parsedInput = newPolicyInputSchema.safeParse(input);
      if (!parsedInput.success) {
        throw new PolicyValidationError('Policy input failed validation', parsedInput.error.format());
      }
      const candidate = {
        id: this.generateId(),
        ...parsedInput.data,
        mask: { ...parsedInput.data.mask },
        createdAt: this.now().toISOString()
      };
      const record = migrationPolicySchema.safeParse(candidate);
      if (!record.success) {
        throw new PolicyValidationError('Policy record failed validation', record.error.format());
      }

      await this.persistence.append(record.data);
      this.mirror.push(clone(record.data));
      const stored = clone(record.data);
      this.emit('policy:added', stored);
      return stored;
    });
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.operationQueue.then(operation);
    this.operationQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new PolicyStoreError('Policy store has not been initialized');
    }
  }
}
