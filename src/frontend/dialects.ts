/**
 * Assembler syntax dialects and the three predicates the tokenizer and analyzer need from them.
 */
export interface AsmDialect {
  /** Canonical lookup name (`ca65`, `kick`, ...). */
  id: string;
  /** Human-readable assembler name. */
  name: string;
  /** Comment marker written in generated lines. */
  commentMarker: ';' | '//';
  /** `generic` also recognizes `//` comments next to `;`. */
  acceptsBothMarkers: boolean;
  supportsColonLabels: boolean;
  /** Whether label names compare case-sensitively. */
  caseSensitive: boolean;
  /** First character marking a local label; empty when the dialect has no prefix convention. */
  localLabelPrefix: string;
  /** Purely numeric labels (`1`, `2`) are local. */
  numericLocalLabels: boolean;
}

const DIALECTS: readonly AsmDialect[] = [
  dialect('generic', 'Generic', ';', true, false, '@', false, true),
  dialect('ca65', 'ca65', ';', true, false, '@', false),
  dialect('kick', 'Kick Assembler', '//', true, true, '!', true),
  dialect('acme', 'ACME', ';', true, false, '.', false),
  dialect('dasm', 'DASM', ';', true, false, '.', true),
  dialect('tass', 'Turbo Assembler', ';', true, false, '@', false),
  dialect('64tass', '64tass', ';', true, true, '', false),
  dialect('buddy', 'Buddy Assembler', '//', true, false, '@', false),
  dialect('merlin', 'Merlin', ';', false, false, ':', false),
  dialect('lisa', 'LISA', ';', true, false, '.', false),
];

const ALIASES: ReadonlyMap<string, string> = new Map([['kickass', 'kick']]);

function dialect(
  id: string,
  name: string,
  commentMarker: ';' | '//',
  supportsColonLabels: boolean,
  caseSensitive: boolean,
  localLabelPrefix: string,
  numericLocalLabels: boolean,
  acceptsBothMarkers = false,
): AsmDialect {
  return {
    id,
    name,
    commentMarker,
    acceptsBothMarkers,
    supportsColonLabels,
    caseSensitive,
    localLabelPrefix,
    numericLocalLabels,
  };
}

/**
 * Names accepted by {@link findDialect}, in table order.
 */
export const dialectNames: readonly string[] = DIALECTS.map((d) => d.id);

/**
 * Look up a dialect by name (case-insensitive). Returns `undefined` for unknown names.
 */
export function findDialect(name: string): AsmDialect | undefined {
  const lower = name.toLowerCase();
  const id = ALIASES.get(lower) ?? lower;
  return DIALECTS.find((d) => d.id === id);
}

/**
 * The `generic` dialect (accepts `;` and `//` comments, `@` local labels).
 */
export function defaultDialect(): AsmDialect {
  // Table order puts `generic` first.
  const generic = DIALECTS[0];
  if (!generic) throw new Error('dialect table is empty');
  return generic;
}

/**
 * Whether `text` starting at `index` begins a comment in this dialect.
 */
export function isCommentStart(text: string, index: number, d: AsmDialect): boolean {
  const startsSlashes = text.startsWith('//', index);
  if (d.commentMarker === '//') return startsSlashes;
  if (d.acceptsBothMarkers && startsSlashes) return true;
  return text[index] === ';';
}

/**
 * Length of the comment marker found at `index` (0 when there is none).
 */
export function commentMarkerLength(text: string, index: number, d: AsmDialect): number {
  if (!isCommentStart(text, index, d)) return 0;
  return text[index] === ';' ? 1 : 2;
}

/**
 * Whether a label name is local (scoped to the nearest preceding global label).
 */
export function isLocalLabel(label: string, d: AsmDialect): boolean {
  if (label.length === 0) return false;
  if (d.localLabelPrefix.length > 0 && label.startsWith(d.localLabelPrefix)) return true;
  return d.numericLocalLabels && /^[0-9]+$/.test(label);
}

/**
 * Normalize a label name for comparison under the dialect's case rules.
 */
export function labelKey(name: string, d: AsmDialect): string {
  return d.caseSensitive ? name : name.toLowerCase();
}
