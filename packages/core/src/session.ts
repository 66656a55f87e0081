import type { CoreLogger, StorageBackend } from './backend';
import { noopLogger } from './backend';
import { assertUnreachable, classifyFailure, describeFailure } from './errors';
import {
  DEFAULT_RESTORE_DAYS,
  createInitialState,
  reduce,
  type Effect,
  type MachineEvent,
  type MachineState,
  type Transition
} from './machine';
import { MigrationOrchestrator, type ExecutionOutcome } from './orchestrator';
import type { MigrationPolicy } from './policySchema';
import type { PolicyStore } from './policyStore';
import { SelectionModel, maskApplicationMessage } from './selection';
import { DEFAULT_STATUS_LIMIT, StatusLog } from './statusLog';

export interface ConsoleSessionOptions {
  backend: StorageBackend;
  /** Must already be initialized; loading failures belong to startup. */
  policyStore: PolicyStore;
  logger?: CoreLogger;
  restoreDays?: number;
  statusLimit?: number;
}

export type DispatchResult = Transition & {
  outcomes: ExecutionOutcome[];
};

const failureDetail = (error: unknown) => describeFailure(classifyFailure(error));

/**
 * Single owner of the console's mutable state. Every change goes through `dispatch`, which
 * reduces the event and then runs the resulting effects one after another; remote calls are
 * awaited before the next event is accepted.
 */
export class ConsoleSession {
  readonly selection = new SelectionModel();
  readonly status: StatusLog;
  private readonly policyStore: PolicyStore;
  private readonly orchestrator: MigrationOrchestrator;
  private readonly logger: CoreLogger;
  private readonly restoreDays: number;
  private machine: MachineState = createInitialState();
  private visiblePolicies: MigrationPolicy[];
  private quitRequested = false;

  constructor(options: ConsoleSessionOptions) {
    this.status = new StatusLog(options.statusLimit ?? DEFAULT_STATUS_LIMIT);
    this.policyStore = options.policyStore;
    this.logger = options.logger ?? noopLogger;
    this.restoreDays = options.restoreDays ?? DEFAULT_RESTORE_DAYS;
    this.visiblePolicies = this.policyStore.list();
    this.orchestrator = new MigrationOrchestrator({
      backend: options.backend,
      selection: this.selection,
      policyStore: this.policyStore,
      status: this.status,
      logger: this.logger
    });
  }

  get state(): MachineState {
    return this.machine;
  }

  get policies(): readonly MigrationPolicy[] {
    return this.visiblePolicies;
  }

  get finished(): boolean {
    return this.quitRequested;
  }

  async start(): Promise<void> {
    this.status.push('Loading buckets…');
    try {
      await this.orchestrator.refreshBuckets();
    } catch (error) {
      this.status.push(`Failed to load buckets: ${failureDetail(error)}`);
      this.logger.error({ err: failureDetail(error) }, 'initial bucket load failed');
    }
  }

  async dispatch(event: MachineEvent): Promise<DispatchResult> {
    const transition = reduce(this.machine, event, this.selection, { restoreDays: this.restoreDays });
    this.machine = transition.state;
    const outcomes: ExecutionOutcome[] = [];
    for (const effect of transition.effects) {
      const outcome = await this.runEffect(effect);
      if (outcome) {
        outcomes.push(outcome);
      }
    }
    return { ...transition, outcomes };
  }

  private async runEffect(effect: Effect): Promise<ExecutionOutcome | null> {
    switch (effect.type) {
      case 'status':
        this.status.push(effect.message);
        return null;
      case 'quit':
        this.quitRequested = true;
        return null;
      case 'moveSelection':
        this.selection.move(effect.pane, effect.delta);
        return null;
      case 'jumpSelection':
        this.selection.jump(effect.pane, effect.to);
        return null;
      case 'applyMask':
        this.status.push(maskApplicationMessage(this.selection.applyMask(effect.mask)));
        return null;
      case 'loadObjects':
        try {
          await this.orchestrator.loadObjects();
        } catch (error) {
          this.status.push(`Failed to load objects: ${failureDetail(error)}`);
        }
        return null;
      case 'refreshBuckets':
        try {
          await this.orchestrator.refreshBuckets();
        } catch (error) {
          this.status.push(`Bucket refresh failed: ${failureDetail(error)}`);
        }
        return null;
      case 'inspectObject':
        try {
          await this.orchestrator.inspectObject();
        } catch (error) {
          this.status.push(`Inspect failed: ${failureDetail(error)}`);
        }
        return null;
      case 'execute': {
        const outcome = await this.orchestrator.execute(effect.action);
        if (outcome.type === 'savePolicy' && outcome.policy) {
          this.visiblePolicies = this.policyStore.list();
        }
        return outcome;
      }
      default:
        return assertUnreachable(effect);
    }
  }
}
