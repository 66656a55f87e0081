import {
  SELECTABLE_TIERS,
  describeRestoreState,
  tierLabel,
  type MachineState,
  type MaskDefinition,
  type MaskField,
  type MigrationPolicy,
  type PendingAction,
  type SelectionModel,
  type StatusLog
} from '@tierdeck/core';

/** Everything the renderer reads; a console session satisfies it. */
export interface ScreenSource {
  readonly selection: SelectionModel;
  readonly status: StatusLog;
  readonly state: MachineState;
  readonly policies: readonly MigrationPolicy[];
}

export type Panel = {
  title: string;
  lines: string[];
};

export type ScreenSize = {
  columns: number;
  rows: number;
};

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

const HELP_LINE =
  'Tab switch  m mask  s storage  p save-policy  r restore  i inspect  f refresh  Esc clear  ? help  l log  q quit';

const HELP_TEXT = [
  'Navigation: Tab/Shift+Tab switch panes, arrows and page keys move, Enter loads bucket objects.',
  "Masks: 'm' opens the editor, Tab moves between fields, arrows/space adjust match mode and case, Enter applies.",
  'An active mask targets every matching object; without one the selected row is the target.',
  "Storage: 's' selects a destination class, 'o' toggles restore-first while confirming, Enter accepts.",
  "Policies: 'p' saves the current mask and bucket with a target class.",
  "Restores: 'r' requests a temporary restore for the targets; 'i' refreshes object metadata.",
  "Logs: 'l' opens the status log; 'f' refreshes buckets; Esc clears the mask; 'q' or Ctrl+C quits."
];

const MASK_FIELD_LABELS: Record<MaskField, string> = {
  name: 'Name',
  pattern: 'Pattern',
  mode: 'Match mode',
  case: 'Case sensitive'
};

export function formatSize(size: number): string {
  if (size > GB) {
    return `${(size / GB).toFixed(2)} GB`;
  }
  if (size > MB) {
    return `${(size / MB).toFixed(2)} MB`;
  }
  if (size > KB) {
    return `${(size / KB).toFixed(2)} KB`;
  }
  return `${size} B`;
}

function fit(text: string, width: number): string {
  const characters = Array.from(text);
  if (characters.length > width) {
    return width > 1 ? `${characters.slice(0, width - 1).join('')}…` : characters.slice(0, width).join('');
  }
  return text + ' '.repeat(width - characters.length);
}

const marker = (selected: boolean) => (selected ? '>' : ' ');

export function bucketsPanel(selection: SelectionModel): Panel {
  return {
    title: `Buckets (${selection.buckets.length}) - Enter to load objects`,
    lines: selection.buckets.map(
      (bucket, index) =>
        `${marker(index === selection.selectedBucketIndex)} ${bucket.name} ${bucket.region ?? 'region unresolved'}`
    )
  };
}

export function objectsPanel(selection: SelectionModel): Panel {
  const mask = selection.activeMask;
  return {
    title: mask ? `Objects - mask: ${mask.summary()}` : 'Objects',
    lines: selection
      .activeObjects()
      .map(
        (object, index) =>
          `${marker(index === selection.selectedObjectIndex)} ${object.key} ${formatSize(object.size)} ${tierLabel(
            object.storageTier
          )}`
      )
  };
}

export function objectDetailPanel(selection: SelectionModel): Panel {
  const object = selection.selectedObject();
  if (!object) {
    return { title: 'Selected object', lines: ['No object selected'] };
  }
  return {
    title: 'Selected object',
    lines: [
      `Key: ${object.key}`,
      `Size: ${formatSize(object.size)}`,
      `Storage: ${tierLabel(object.storageTier)}`,
      `Last modified: ${object.lastModified ?? 'unknown'}`,
      `Restore: ${describeRestoreState(object.restoreState)}`
    ]
  };
}

export function maskPanel(selection: SelectionModel): Panel {
  const mask = selection.activeMask;
  const lines = mask
    ? [`Active: ${mask.summary()}`, `${selection.targetCount()} objects currently targeted`]
    : ["No active mask. Press 'm' to edit."];
  return { title: 'Mask', lines };
}

export function policiesPanel(policies: readonly MigrationPolicy[]): Panel {
  if (policies.length === 0) {
    return { title: 'Policies', lines: ['No saved policies'] };
  }
  return {
    title: 'Policies',
    lines: policies.map((policy) => `${policy.mask.name} -> ${tierLabel(policy.targetTier)} (${policy.bucket})`)
  };
}

export function statusPanel(status: StatusLog): Panel {
  return { title: 'Status', lines: [HELP_LINE, ...status.newestFirst()] };
}

export function maskEditorOverlay(draft: MaskDefinition, field: MaskField): Panel {
  const row = (name: MaskField, value: string, hint = '') =>
    `${name === field ? '>' : ' '} ${MASK_FIELD_LABELS[name]}: ${value}${hint}`;
  return {
    title: 'Mask editor - Tab moves fields, arrows/space adjust options, Enter applies, Esc cancels',
    lines: [
      row('name', draft.name),
      row('pattern', draft.pattern),
      row('mode', draft.kind, '  (use arrows or space)'),
      row('case', draft.caseSensitive ? 'on' : 'off', '  (space toggles)'),
      'Enter applies the mask. Esc cancels and keeps the previous filter.'
    ]
  };
}

export function storageSelectorOverlay(cursor: number): Panel {
  return {
    title: 'Select storage class (Enter confirm, Esc cancel)',
    lines: SELECTABLE_TIERS.map((tier, index) => `${marker(index === cursor)} ${tierLabel(tier)}`)
  };
}

export function confirmationOverlay(pending: PendingAction, selection: SelectionModel): Panel {
  const lines = ['Confirm operation (Enter/y to proceed, Esc/n to cancel, o toggle restore-first)'];
  switch (pending.type) {
    case 'transition':
      lines.push(
        `Transition ${selection.targetCount()} object(s) to ${tierLabel(pending.targetTier)}`,
        `Restore before transition: ${pending.restoreFirst ? 'yes' : 'no'}`
      );
      break;
    case 'restore':
      lines.push(`Request restore for ${selection.targetCount()} object(s) (${pending.days} days)`);
      break;
    case 'savePolicy':
      lines.push(
        'Save policy with current mask',
        `Bucket: ${selection.selectedBucketName() ?? 'n/a'}`,
        `Target storage class: ${tierLabel(pending.targetTier)}`
      );
      break;
  }
  return { title: 'Confirm', lines };
}

export function helpOverlay(): Panel {
  return { title: 'Cheat sheet - Esc/?/Enter to close', lines: [...HELP_TEXT] };
}

export function logOverlay(status: StatusLog): Panel {
  const messages = status.newestFirst();
  return {
    title: 'Status log - Esc/l/Enter to close',
    lines:
      messages.length === 0
        ? ['No status messages yet.']
        : messages.map((message, index) => `${String(index + 1).padStart(2, ' ')}. ${message}`)
  };
}

function overlayFor(source: ScreenSource): Panel | null {
  const { mode } = source.state;
  switch (mode.kind) {
    case 'browsing':
      return null;
    case 'editingMask':
      return maskEditorOverlay(mode.draft, mode.field);
    case 'selectingStorageClass':
      return storageSelectorOverlay(mode.cursor);
    case 'confirming':
      return confirmationOverlay(mode.pending, source.selection);
    case 'showingHelp':
      return helpOverlay();
    case 'viewingLog':
      return logOverlay(source.status);
  }
}

function panelTitle(panel: Panel, focused: boolean): string {
  return focused ? `[${panel.title}]` : ` ${panel.title} `;
}

type PlacedPanel = {
  panel: Panel;
  focused: boolean;
  selectedIndex?: number;
};

/** Keeps the selected row visible when a list is taller than its column. */
function windowed(lines: string[], selectedIndex: number, height: number): string[] {
  if (lines.length <= height) {
    return lines;
  }
  const start = Math.min(Math.max(selectedIndex - height + 1, 0), lines.length - height);
  return lines.slice(start, start + height);
}

function columns(stacks: PlacedPanel[][], width: number, height: number): string[] {
  const columnWidth = Math.max(Math.floor((width - (stacks.length - 1) * 3) / stacks.length), 8);
  const rendered = stacks.map((stack) => {
    const lines: string[] = [];
    stack.forEach((placed, position) => {
      lines.push(panelTitle(placed.panel, placed.focused));
      const body =
        placed.selectedIndex === undefined
          ? placed.panel.lines
          : windowed(placed.panel.lines, placed.selectedIndex, height - 1);
      lines.push(...body);
      if (position < stack.length - 1) {
        lines.push('');
      }
    });
    return lines.slice(0, height).map((line) => fit(line, columnWidth));
  });
  const output: string[] = [];
  for (let row = 0; row < height; row += 1) {
    output.push(rendered.map((lines) => lines[row] ?? ' '.repeat(columnWidth)).join(' │ '));
  }
  return output;
}

function boxed(panel: Panel, width: number): string[] {
  const inner = Math.max(width - 4, 8);
  const title = Array.from(` ${panel.title} `).slice(0, inner);
  return [
    `┌─${title.join('')}${'─'.repeat(inner - title.length)}─┐`,
    ...panel.lines.map((line) => `│ ${fit(line, inner)} │`),
    `└${'─'.repeat(inner + 2)}┘`
  ];
}

/** Lays out the full screen as text lines, one per terminal row. */
export function renderScreen(source: ScreenSource, size: ScreenSize): string[] {
  const width = Math.max(size.columns, 40);
  const height = Math.max(size.rows, 12);
  const status = statusPanel(source.status);
  const statusHeight = Math.min(status.lines.length + 1, Math.max(Math.floor(height / 3), 4));
  const bodyHeight = height - statusHeight;
  const { selection } = source;
  const { pane } = source.state;

  const overlay = overlayFor(source);
  const body = overlay
    ? boxed(overlay, width).slice(0, bodyHeight)
    : columns(
        [
          [{ panel: bucketsPanel(selection), focused: pane === 'buckets', selectedIndex: selection.selectedBucketIndex }],
          [{ panel: objectsPanel(selection), focused: pane === 'objects', selectedIndex: selection.selectedObjectIndex }],
          [
            { panel: objectDetailPanel(selection), focused: false },
            { panel: maskPanel(selection), focused: pane === 'mask' },
            { panel: policiesPanel(source.policies), focused: pane === 'policies' }
          ]
        ],
        width,
        bodyHeight
      );
  while (body.length < bodyHeight) {
    body.push('');
  }

  const statusLines = [panelTitle(status, false), ...status.lines].slice(0, statusHeight);
  return [...body, ...statusLines].map((line) => fit(line, width));
}
