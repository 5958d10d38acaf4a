/**
 * Addressing-mode shape of an operand, as far as it can be read from source text.
 *
 * Zero page and absolute forms are not distinguished: the optimizer never needs operand sizes.
 */
export type AddressingMode =
  | 'none' //                 (implied)
  | 'accumulator' //          A
  | 'immediate' //            #$FF
  | 'direct' //               $FF / $FFFF / label
  | 'indexed-x' //            $FFFF,X
  | 'indexed-y' //            $FFFF,Y
  | 'indirect' //             ($FFFF)
  | 'indexed-indirect-x' //   ($FF,X)
  | 'indirect-indexed-y' //   ($FF),Y
  | 'indirect-indexed-z' //   ($FF),Z   (45GS02)
  | 'long-indirect' //        [$FF] / [$FF],Y / [$FF],Z
  | 'stack-relative' //       $FF,S / ($FF,S),Y
  | 'block-move' //           $01,$02   (MVN/MVP)
  | 'other';

/**
 * Structured view of an operand.
 */
export interface Operand {
  mode: AddressingMode;
  /** Operand expression with the addressing syntax (`#`, parentheses, index suffix) removed. */
  expr: string;
  /** Statically known numeric value of `expr`, when it is a plain literal. */
  value?: number;
  /** Post-index of a `long-indirect` operand (`[zp],Y`, `[zp],Z`). */
  index?: 'Y' | 'Z';
}

const NONE: Operand = { mode: 'none', expr: '' };

/**
 * Parse a numeric literal (`$FF`, `%1010`, `0x10`, `0b11`, `42`, `'A'`).
 */
export function parseNumberLiteral(text: string): number | undefined {
  const t = text.trim();
  if (/^\$[0-9A-Fa-f]+$/.test(t)) {
    return Number.parseInt(t.slice(1), 16);
  }
  if (/^0x[0-9A-Fa-f]+$/i.test(t)) {
    return Number.parseInt(t.slice(2), 16);
  }
  if (/^%[01]+$/.test(t)) {
    return Number.parseInt(t.slice(1), 2);
  }
  if (/^0b[01]+$/i.test(t)) {
    return Number.parseInt(t.slice(2), 2);
  }
  if (/^[0-9]+$/.test(t)) {
    return Number.parseInt(t, 10);
  }
  if (/^'.'?$/.test(t) && t.length >= 2) {
    return t.charCodeAt(1);
  }
  return undefined;
}

function literalValue(expr: string): number | undefined {
  const t = expr.trim();
  // Low/high byte selectors on a literal are still literals.
  if (t.startsWith('<') || t.startsWith('>')) {
    const inner = parseNumberLiteral(t.slice(1));
    if (inner === undefined) return undefined;
    return t.startsWith('<') ? inner & 0xff : (inner >> 8) & 0xff;
  }
  return parseNumberLiteral(t);
}

function isWrapped(text: string, open: string, close: string): boolean {
  if (!text.startsWith(open) || !text.endsWith(close)) return false;
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === open) depth++;
    else if (ch === close) {
      depth--;
      // The opening bracket must close at the very end, e.g. not `(a)+(b)`.
      if (depth === 0 && i !== text.length - 1) return false;
    }
  }
  return depth === 0;
}

function splitIndex(text: string): { base: string; index: string } | undefined {
  const m = /^(.*?)\s*,\s*([XYZSxyzs])$/.exec(text);
  if (!m) return undefined;
  return { base: (m[1] ?? '').trim(), index: (m[2] ?? '').toUpperCase() };
}

function direct(mode: AddressingMode, expr: string): Operand {
  const value = parseNumberLiteral(expr);
  return value === undefined ? { mode, expr } : { mode, expr, value };
}

/**
 * Parse raw operand text into a structured {@link Operand}.
 */
export function parseOperand(text: string | undefined): Operand {
  const t = (text ?? '').trim();
  if (t.length === 0) return NONE;
  if (t === 'A' || t === 'a') return { mode: 'accumulator', expr: '' };

  if (t.startsWith('#')) {
    const expr = t.slice(1).trim();
    const value = literalValue(expr);
    return value === undefined ? { mode: 'immediate', expr } : { mode: 'immediate', expr, value };
  }

  if (t.startsWith('[')) {
    const closing = t.indexOf(']');
    const expr = t.slice(1, closing < 0 ? t.length : closing).trim();
    const suffix = closing < 0 ? '' : t.slice(closing + 1).trim().toUpperCase();
    if (suffix === ',Y' || suffix === ', Y') return { mode: 'long-indirect', expr, index: 'Y' };
    if (suffix === ',Z' || suffix === ', Z') return { mode: 'long-indirect', expr, index: 'Z' };
    return { mode: 'long-indirect', expr };
  }

  if (t.startsWith('(')) {
    if (isWrapped(t, '(', ')')) {
      const inner = t.slice(1, -1).trim();
      const idx = splitIndex(inner);
      if (idx?.index === 'X') return direct('indexed-indirect-x', idx.base);
      if (idx?.index === 'S') return direct('stack-relative', idx.base);
      if (!idx) return direct('indirect', inner);
      return { mode: 'other', expr: t };
    }
    const idx = splitIndex(t);
    if (idx && isWrapped(idx.base, '(', ')')) {
      const inner = idx.base.slice(1, -1).trim();
      if (idx.index === 'Y') {
        const stack = splitIndex(inner);
        if (stack?.index === 'S') return direct('stack-relative', stack.base);
        return direct('indirect-indexed-y', inner);
      }
      if (idx.index === 'Z') return direct('indirect-indexed-z', inner);
    }
  }

  const idx = splitIndex(t);
  if (idx) {
    if (idx.index === 'X') return direct('indexed-x', idx.base);
    if (idx.index === 'Y') return direct('indexed-y', idx.base);
    if (idx.index === 'S') return direct('stack-relative', idx.base);
    return { mode: 'other', expr: t };
  }
  if (/^[^,()]+,[^,()]+$/.test(t)) return { mode: 'block-move', expr: t };
  if (t.includes(',')) return { mode: 'other', expr: t };
  return direct('direct', t);
}

/**
 * Structural equality of two immediate operands: equal numeric values, or identical expression text when
 * either side is not a literal (`#$00` equals `#0`; `#<label` equals only `#<label`).
 */
export function sameImmediate(a: Operand, b: Operand): boolean {
  if (a.mode !== 'immediate' || b.mode !== 'immediate') return false;
  if (a.value !== undefined && b.value !== undefined) return a.value === b.value;
  return a.expr === b.expr;
}

/**
 * Structural equality of any two operands (same mode, same value or same expression text).
 */
export function sameOperand(a: Operand, b: Operand): boolean {
  if (a.mode !== b.mode) return false;
  if (a.value !== undefined && b.value !== undefined) return a.value === b.value;
  return a.expr === b.expr;
}

/**
 * Whether the operand is an immediate with a statically known value of `value`.
 */
export function isImmediateValue(op: Operand, value: number): boolean {
  return op.mode === 'immediate' && op.value === value;
}

/**
 * Symbol-like tokens referenced by an operand expression (numbers and hex/binary literals excluded).
 *
 * Local-label sigils (`@`, `.`, `!`, `:`) are kept as part of the token.
 */
export function operandSymbols(expr: string): string[] {
  const out: string[] = [];
  let i = 0;
  while (i < expr.length) {
    const ch = expr[i] ?? '';
    if (ch === '$' || ch === '%') {
      i++;
      while (i < expr.length && /[0-9A-Fa-f]/.test(expr[i] ?? '')) i++;
      continue;
    }
    if (ch === "'" || ch === '"') {
      const end = expr.indexOf(ch, i + 1);
      i = end < 0 ? expr.length : end + 1;
      continue;
    }
    if (/[0-9]/.test(ch)) {
      while (i < expr.length && /[0-9A-Za-z_]/.test(expr[i] ?? '')) i++;
      continue;
    }
    if (/[A-Za-z_@.!:]/.test(ch)) {
      const start = i;
      i++;
      while (i < expr.length && /[A-Za-z0-9_@.]/.test(expr[i] ?? '')) i++;
      const token = expr.slice(start, i);
      if (/[A-Za-z0-9_]/.test(token)) out.push(token);
      continue;
    }
    i++;
  }
  return out;
}
