import { PAGE_SIZE, type MachineEvent, type Mode } from '@tierdeck/core';

/** The subset of a readline keypress the console reacts to. */
export type KeyInput = {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
};

function isCtrlC(key: KeyInput): boolean {
  return Boolean(key.ctrl) && key.name === 'c';
}

function isBackTab(key: KeyInput): boolean {
  return key.name === 'tab' && Boolean(key.shift);
}

function printable(key: KeyInput): string | null {
  if (key.ctrl || key.meta) {
    return null;
  }
  const sequence = key.sequence ?? '';
  const characters = Array.from(sequence);
  if (characters.length !== 1) {
    return null;
  }
  const codePoint = sequence.codePointAt(0) ?? 0;
  return codePoint >= 0x20 && codePoint !== 0x7f ? sequence : null;
}

function browsingEvent(key: KeyInput): MachineEvent | null {
  if (isBackTab(key)) {
    return { type: 'previousPane' };
  }
  switch (key.name) {
    case 'tab':
      return { type: 'nextPane' };
    case 'up':
      return { type: 'move', delta: -1 };
    case 'down':
      return { type: 'move', delta: 1 };
    case 'pageup':
      return { type: 'move', delta: -PAGE_SIZE };
    case 'pagedown':
      return { type: 'move', delta: PAGE_SIZE };
    case 'home':
      return { type: 'jump', to: 'start' };
    case 'end':
      return { type: 'jump', to: 'end' };
    case 'return':
      return { type: 'loadObjects' };
    case 'escape':
      return { type: 'clearMask' };
    default:
      break;
  }
  switch (printable(key)) {
    case 'q':
      return { type: 'quit' };
    case 'm':
      return { type: 'openMaskEditor' };
    case 'f':
      return { type: 'refreshBuckets' };
    case 'i':
      return { type: 'inspectObject' };
    case 's':
      return { type: 'beginTransition' };
    case 'r':
      return { type: 'beginRestore' };
    case 'p':
      return { type: 'beginSavePolicy' };
    case '?':
      return { type: 'openHelp' };
    case 'l':
    case 'L':
      return { type: 'openLog' };
    default:
      return null;
  }
}

function maskEditorEvent(key: KeyInput): MachineEvent | null {
  if (isBackTab(key)) {
    return { type: 'previousField' };
  }
  switch (key.name) {
    case 'escape':
      return { type: 'cancel' };
    case 'return':
      return { type: 'confirm' };
    case 'tab':
      return { type: 'nextField' };
    case 'backspace':
      return { type: 'backspace' };
    case 'left':
      return { type: 'cycleKind', direction: -1 };
    case 'right':
      return { type: 'cycleKind', direction: 1 };
    default: {
      const text = printable(key);
      return text === null ? null : { type: 'input', text };
    }
  }
}

function storageSelectorEvent(key: KeyInput): MachineEvent | null {
  switch (key.name) {
    case 'escape':
      return { type: 'cancel' };
    case 'up':
      return { type: 'move', delta: -1 };
    case 'down':
      return { type: 'move', delta: 1 };
    case 'return':
      return { type: 'confirm' };
    default:
      return null;
  }
}

function confirmationEvent(key: KeyInput): MachineEvent | null {
  if (key.name === 'escape') {
    return { type: 'cancel' };
  }
  if (key.name === 'return') {
    return { type: 'confirm' };
  }
  switch (printable(key)) {
    case 'n':
      return { type: 'cancel' };
    case 'y':
      return { type: 'confirm' };
    case 'o':
      return { type: 'toggleRestoreFirst' };
    default:
      return null;
  }
}

function overlayEvent(key: KeyInput, closers: readonly string[]): MachineEvent | null {
  if (key.name === 'escape' || key.name === 'return') {
    return { type: 'close' };
  }
  const text = printable(key);
  return text !== null && closers.includes(text) ? { type: 'close' } : null;
}

/** Translates a keypress into a machine event for the current mode, or null to ignore it. */
export function mapKey(mode: Mode, key: KeyInput): MachineEvent | null {
  if (isCtrlC(key)) {
    return { type: 'quit' };
  }
  switch (mode.kind) {
    case 'browsing':
      return browsingEvent(key);
    case 'editingMask':
      return maskEditorEvent(key);
    case 'selectingStorageClass':
      return storageSelectorEvent(key);
    case 'confirming':
      return confirmationEvent(key);
    case 'showingHelp':
      return overlayEvent(key, ['?']);
    case 'viewingLog':
      return overlayEvent(key, ['l', 'L']);
  }
}
