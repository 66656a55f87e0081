import { assertUnreachable } from './errors';
import { compileMask, nextMaskKind, toMaskDefinition, type Mask, type MaskDefinition } from './mask';
import type { SelectionPane, SelectionView } from './selection';
import { SELECTABLE_TIERS, tierLabel, type StorageTier } from './storageTiers';

export const DEFAULT_RESTORE_DAYS = 7;
export const PAGE_SIZE = 5;

export type ActivePane = 'buckets' | 'objects' | 'mask' | 'policies';

const PANE_ORDER: readonly ActivePane[] = ['buckets', 'objects', 'mask', 'policies'];

export type MaskField = 'name' | 'pattern' | 'mode' | 'case';

const MASK_FIELD_ORDER: readonly MaskField[] = ['name', 'pattern', 'mode', 'case'];

export type StorageIntent = 'transition' | 'savePolicy';

export type PendingAction =
  | { type: 'transition'; targetTier: StorageTier; restoreFirst: boolean }
  | { type: 'restore'; days: number }
  | { type: 'savePolicy'; targetTier: StorageTier };

export type Mode =
  | { kind: 'browsing' }
  | { kind: 'editingMask'; draft: MaskDefinition; field: MaskField }
  | { kind: 'selectingStorageClass'; intent: StorageIntent; cursor: number }
  | { kind: 'confirming'; pending: PendingAction }
  | { kind: 'showingHelp' }
  | { kind: 'viewingLog' };

export type ModeKind = Mode['kind'];

export type MachineState = {
  mode: Mode;
  pane: ActivePane;
};

export type MachineEvent =
  | { type: 'quit' }
  | { type: 'nextPane' }
  | { type: 'previousPane' }
  | { type: 'move'; delta: number }
  | { type: 'jump'; to: 'start' | 'end' }
  | { type: 'loadObjects' }
  | { type: 'refreshBuckets' }
  | { type: 'inspectObject' }
  | { type: 'openMaskEditor' }
  | { type: 'clearMask' }
  | { type: 'beginTransition' }
  | { type: 'beginSavePolicy' }
  | { type: 'beginRestore' }
  | { type: 'openHelp' }
  | { type: 'openLog' }
  | { type: 'close' }
  | { type: 'cancel' }
  | { type: 'confirm' }
  | { type: 'toggleRestoreFirst' }
  | { type: 'nextField' }
  | { type: 'previousField' }
  | { type: 'input'; text: string }
  | { type: 'backspace' }
  | { type: 'cycleKind'; direction: 1 | -1 };

export type Effect =
  | { type: 'status'; message: string }
  | { type: 'quit' }
  | { type: 'moveSelection'; pane: SelectionPane; delta: number }
  | { type: 'jumpSelection'; pane: SelectionPane; to: 'start' | 'end' }
  | { type: 'loadObjects' }
  | { type: 'refreshBuckets' }
  | { type: 'inspectObject' }
  | { type: 'applyMask'; mask: Mask | null }
  | { type: 'execute'; action: PendingAction };

export type Transition = {
  state: MachineState;
  effects: Effect[];
};

export type MachineOptions = {
  restoreDays?: number;
};

export const DEFAULT_MASK_DRAFT: MaskDefinition = {
  name: 'Untitled mask',
  pattern: '',
  kind: 'prefix',
  caseSensitive: false
};

export function createInitialState(): MachineState {
  return { mode: { kind: 'browsing' }, pane: 'buckets' };
}

export function pendingAction(state: MachineState): PendingAction | null {
  return state.mode.kind === 'confirming' ? state.mode.pending : null;
}

const status = (message: string): Effect => ({ type: 'status', message });

const unchanged = (state: MachineState, ...effects: Effect[]): Transition => ({ state, effects });

const withMode = (state: MachineState, mode: Mode, ...effects: Effect[]): Transition => ({
  state: { ...state, mode },
  effects
});

function cycle<T>(values: readonly T[], current: T, direction: 1 | -1): T {
  const index = values.indexOf(current);
  const next = (index + direction + values.length) % values.length;
  return values[next] ?? current;
}

function dropLastCharacter(value: string): string {
  return Array.from(value).slice(0, -1).join('');
}

function selectionPane(pane: ActivePane): SelectionPane | null {
  if (pane === 'buckets' || pane === 'objects') {
    return pane;
  }
  return null;
}

function reduceBrowsing(
  state: MachineState,
  event: MachineEvent,
  selection: SelectionView,
  options: Required<MachineOptions>
): Transition {
  switch (event.type) {
    case 'quit':
      return unchanged(state, { type: 'quit' });
    case 'nextPane':
      return { state: { ...state, pane: cycle(PANE_ORDER, state.pane, 1) }, effects: [] };
    case 'previousPane':
      return { state: { ...state, pane: cycle(PANE_ORDER, state.pane, -1) }, effects: [] };
    case 'move': {
      const pane = selectionPane(state.pane);
      return pane ? unchanged(state, { type: 'moveSelection', pane, delta: event.delta }) : unchanged(state);
    }
    case 'jump': {
      const pane = selectionPane(state.pane);
      return pane ? unchanged(state, { type: 'jumpSelection', pane, to: event.to }) : unchanged(state);
    }
    case 'loadObjects':
      return state.pane === 'buckets' ? unchanged(state, { type: 'loadObjects' }) : unchanged(state);
    case 'refreshBuckets':
      return unchanged(state, status('Refreshing buckets…'), { type: 'refreshBuckets' });
    case 'inspectObject':
      return unchanged(state, { type: 'inspectObject' });
    case 'openMaskEditor': {
      const active = selection.activeMask;
      const draft = active ? toMaskDefinition(active) : { ...DEFAULT_MASK_DRAFT };
      return withMode(
        state,
        { kind: 'editingMask', draft, field: 'pattern' },
        status('Mask editor active - Tab moves between fields, arrows/space adjust options, Enter applies')
      );
    }
    case 'clearMask':
      return selection.activeMask ? unchanged(state, { type: 'applyMask', mask: null }) : unchanged(state);
    case 'beginTransition': {
      if (!selection.selectedBucketName()) {
        return unchanged(state, status('Storage selection unavailable: Select a bucket first'));
      }
      if (selection.targetCount() === 0) {
        return unchanged(state, status('Storage selection unavailable: Select at least one object (mask or row)'));
      }
      return withMode(state, { kind: 'selectingStorageClass', intent: 'transition', cursor: 0 });
    }
    case 'beginSavePolicy': {
      if (!selection.selectedBucketName()) {
        return unchanged(state, status('Cannot save policy: Select a bucket first'));
      }
      if (!selection.activeMask) {
        return unchanged(state, status('Cannot save policy: Apply a mask before saving a policy'));
      }
      return withMode(
        state,
        { kind: 'selectingStorageClass', intent: 'savePolicy', cursor: 0 },
        status('Select target storage class for policy')
      );
    }
    case 'beginRestore': {
      if (!selection.selectedBucketName() || selection.targetCount() === 0) {
        return unchanged(state, status('Cannot request restore: Select objects to restore first'));
      }
      return withMode(
        state,
        { kind: 'confirming', pending: { type: 'restore', days: options.restoreDays } },
        status('Confirm restore request (Enter to proceed, Esc to cancel)')
      );
    }
    case 'openHelp':
      return withMode(state, { kind: 'showingHelp' });
    case 'openLog':
      return withMode(state, { kind: 'viewingLog' });
    default:
      return unchanged(state);
  }
}

function reduceMaskEditor(
  state: MachineState,
  mode: Extract<Mode, { kind: 'editingMask' }>,
  event: MachineEvent
): Transition {
  const edit = (draft: Partial<MaskDefinition>, field: MaskField = mode.field): Transition =>
    withMode(state, { kind: 'editingMask', draft: { ...mode.draft, ...draft }, field });

  switch (event.type) {
    case 'cancel':
      return withMode(state, { kind: 'browsing' }, status('Mask edit cancelled'));
    case 'confirm': {
      if (mode.draft.pattern.length === 0) {
        return unchanged(state, status('Mask pattern cannot be empty'));
      }
      const compiled = compileMask(mode.draft);
      if (!compiled.ok) {
        return unchanged(state, status(compiled.error.message));
      }
      return withMode(state, { kind: 'browsing' }, { type: 'applyMask', mask: compiled.mask });
    }
    case 'nextField':
      return edit({}, cycle(MASK_FIELD_ORDER, mode.field, 1));
    case 'previousField':
      return edit({}, cycle(MASK_FIELD_ORDER, mode.field, -1));
    case 'backspace':
      if (mode.field === 'name') {
        return edit({ name: dropLastCharacter(mode.draft.name) });
      }
      if (mode.field === 'pattern') {
        return edit({ pattern: dropLastCharacter(mode.draft.pattern) });
      }
      return unchanged(state);
    case 'cycleKind':
      return mode.field === 'mode' ? edit({ kind: nextMaskKind(mode.draft.kind, event.direction) }) : unchanged(state);
    case 'input':
      if (mode.field === 'name') {
        return edit({ name: mode.draft.name + event.text });
      }
      if (mode.field === 'pattern') {
        return edit({ pattern: mode.draft.pattern + event.text });
      }
      if (event.text !== ' ') {
        return unchanged(state);
      }
      return mode.field === 'mode'
        ? edit({ kind: nextMaskKind(mode.draft.kind, 1) })
        : edit({ caseSensitive: !mode.draft.caseSensitive });
    default:
      return unchanged(state);
  }
}

function reduceStorageSelector(
  state: MachineState,
  mode: Extract<Mode, { kind: 'selectingStorageClass' }>,
  event: MachineEvent
): Transition {
  switch (event.type) {
    case 'cancel':
      return withMode(state, { kind: 'browsing' });
    case 'move': {
      const cursor = Math.min(Math.max(mode.cursor + event.delta, 0), SELECTABLE_TIERS.length - 1);
      return withMode(state, { ...mode, cursor });
    }
    case 'confirm': {
      const targetTier = SELECTABLE_TIERS[mode.cursor];
      if (!targetTier) {
        return unchanged(state);
      }
      if (mode.intent === 'transition') {
        return withMode(
          state,
          { kind: 'confirming', pending: { type: 'transition', targetTier, restoreFirst: false } },
          status(`Confirm transition to ${tierLabel(targetTier)} (press Enter to confirm)`)
        );
      }
      return withMode(
        state,
        { kind: 'confirming', pending: { type: 'savePolicy', targetTier } },
        status('Confirm saving policy')
      );
    }
    default:
      return unchanged(state);
  }
}

function reduceConfirming(
  state: MachineState,
  mode: Extract<Mode, { kind: 'confirming' }>,
  event: MachineEvent
): Transition {
  switch (event.type) {
    case 'cancel':
      return withMode(state, { kind: 'browsing' }, status('Cancelled'));
    case 'confirm':
      return withMode(state, { kind: 'browsing' }, { type: 'execute', action: mode.pending });
    case 'toggleRestoreFirst': {
      if (mode.pending.type !== 'transition') {
        return unchanged(state);
      }
      const restoreFirst = !mode.pending.restoreFirst;
      return withMode(
        state,
        { kind: 'confirming', pending: { ...mode.pending, restoreFirst } },
        status(restoreFirst ? 'Will request restore before transition' : 'Restore before transition disabled')
      );
    }
    default:
      return unchanged(state);
  }
}

/**
 * Pure transition function of the console: given the current state and an input event it
 * returns the next state and the effects the owner must run, in order. The pending action
 * lives inside the confirming mode, so leaving that mode always discards or consumes it.
 */
export function reduce(
  state: MachineState,
  event: MachineEvent,
  selection: SelectionView,
  options: MachineOptions = {}
): Transition {
  const resolved: Required<MachineOptions> = {
    restoreDays: options.restoreDays ?? DEFAULT_RESTORE_DAYS
  };
  const { mode } = state;

  switch (mode.kind) {
    case 'browsing':
      return reduceBrowsing(state, event, selection, resolved);
    case 'editingMask':
      return reduceMaskEditor(state, mode, event);
    case 'selectingStorageClass':
      return reduceStorageSelector(state, mode, event);
    case 'confirming':
      return reduceConfirming(state, mode, event);
    case 'showingHelp':
    case 'viewingLog':
      return event.type === 'close' ? withMode(state, { kind: 'browsing' }) : unchanged(state);
    default:
      return assertUnreachable(mode);
  }
}
