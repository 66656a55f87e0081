import { ValidationError } from './errors';

export const MASK_KINDS = ['prefix', 'suffix', 'contains', 'regex'] as const;

export type MaskKind = (typeof MASK_KINDS)[number];

export type MaskDefinition = {
  name: string;
  pattern: string;
  kind: MaskKind;
  caseSensitive: boolean;
};

export type Mask = MaskDefinition & {
  matches(key: string): boolean;
  summary(): string;
};

export class MaskCompileError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'MaskCompileError';
  }
}

export type CompileResult = { ok: true; mask: Mask } | { ok: false; error: MaskCompileError };

export function describeMask(definition: MaskDefinition): string {
  const base = `${definition.name} [${definition.kind}: ${definition.pattern}]`;
  return definition.caseSensitive ? `${base} (case-sensitive)` : base;
}

function buildPredicate(definition: MaskDefinition): (key: string) => boolean {
  const { kind, caseSensitive } = definition;

  if (kind === 'regex') {
    let expression: RegExp;
    try {
      expression = new RegExp(definition.pattern, caseSensitive ? '' : 'i');
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new MaskCompileError(`Invalid regex: ${detail}`);
    }
    return (key) => expression.test(key);
  }

  const fold = (value: string) => (caseSensitive ? value : value.toLowerCase());
  const pattern = fold(definition.pattern);

  switch (kind) {
    case 'prefix':
      return (key) => fold(key).startsWith(pattern);
    case 'suffix':
      return (key) => fold(key).endsWith(pattern);
    case 'contains':
      return (key) => fold(key).includes(pattern);
  }
}

/**
 * Compiles a mask definition into a key predicate. Empty patterns and regex patterns that
 * fail to compile are rejected; a rejected definition never yields a mask.
 */
export function compileMask(definition: MaskDefinition): CompileResult {
  if (definition.pattern.length === 0) {
    return { ok: false, error: new MaskCompileError('Mask pattern cannot be empty') };
  }
  let predicate: (key: string) => boolean;
  try {
    predicate = buildPredicate(definition);
  } catch (err) {
    if (err instanceof MaskCompileError) {
      return { ok: false, error: err };
    }
    throw err;
  }
  const frozen: MaskDefinition = {
    name: definition.name,
    pattern: definition.pattern,
    kind: definition.kind,
    caseSensitive: definition.caseSensitive
  };
  return {
    ok: true,
    mask: {
      ...frozen,
      matches: predicate,
      summary: () => describeMask(frozen)
    }
  };
}

export function toMaskDefinition(mask: MaskDefinition): MaskDefinition {
  return {
    name: mask.name,
    pattern: mask.pattern,
    kind: mask.kind,
    caseSensitive: mask.caseSensitive
  };
}

export function nextMaskKind(kind: MaskKind, direction: 1 | -1 = 1): MaskKind {
  const index = MASK_KINDS.indexOf(kind);
  const next = (index + direction + MASK_KINDS.length) % MASK_KINDS.length;
  return MASK_KINDS[next] ?? 'prefix';
}
