/**
 * hdl-expr-utils.ts
 * Deterministic helpers over IR expressions and statements, shared by the
 * structural builder and the behavioral extractor.
 *
 * Rendering rules:
 * - Binary and ternary expressions are always parenthesized: `(a + b)`.
 * - Constant select indices print as plain decimals: `data[3:0]`.
 * - Literals print as written, except folded results which print as
 *   `<width>'h<hex>` (sized) or decimal (unsized).
 */

import type { Expr, Stmt } from '../../models/ir.js';

export interface LiteralValue {
  value: bigint;
  /** Null for unsized literals. */
  width: number | null;
}

/** One bit of a connection expression, LSB first; null for a tied/constant bit. */
export type BitSlice = { net: string; bit: number | null } | null;

export interface DeclaredRange {
  msb: number;
  lsb: number;
  width: number;
}

const SIZED_LITERAL = /^(\d+)?'(s?)([bodh])([0-9a-f_xz?]+)$/i;
const DECIMAL_LITERAL = /^\d[\d_]*$/;
const RADIX_PREFIX: Record<string, string> = { b: '0b', o: '0o', d: '', h: '0x' };
/** Width assumed for unsized operands of width-sensitive operators. */
const UNSIZED_WIDTH = 32;
const MAX_SHIFT = 4096n;

function mask(width: number): bigint {
  return (1n << BigInt(width)) - 1n;
}

function fit(value: bigint, width: number | null): LiteralValue {
  return { value: width === null ? value : value & mask(width), width };
}

function widest(a: number | null, b: number | null): number | null {
  if (a === null) return b;
  if (b === null) return a;
  return Math.max(a, b);
}

function bool(b: boolean): LiteralValue {
  return { value: b ? 1n : 0n, width: 1 };
}

export class HdlExprUtils {
  // ---------------------------------------------------------------------------
  // Literals
  // ---------------------------------------------------------------------------

  /**
   * Parse a Verilog number (`8'hff`, `4'b10_10`, `'d5`, `12`).
   * Returns null for x/z digits or anything that is not a literal.
   */
  static parseLiteral(text: string): LiteralValue | null {
    const t = text.trim();
    if (DECIMAL_LITERAL.test(t)) {
      return { value: BigInt(t.replace(/_/g, '')), width: null };
    }
    const m = SIZED_LITERAL.exec(t);
    if (m === null) return null;
    const [, size, , radix = 'd', rawDigits = ''] = m;
    const digits = rawDigits.replace(/_/g, '').toLowerCase();
    if (/[xz?]/.test(digits) || digits === '') return null;

    let value: bigint;
    try {
      value = BigInt(`${RADIX_PREFIX[radix.toLowerCase()] ?? ''}${digits}`);
    } catch {
      return null; // digit outside the radix, e.g. 4'b102
    }
    const width = size !== undefined ? Number(size) : null;
    return fit(value, width);
  }

  /** Print a folded value: sized as `<w>'h<hex>`, unsized as decimal. */
  static formatLiteral(lit: LiteralValue): string {
    if (lit.width === null) return lit.value.toString(10);
    return `${lit.width}'h${lit.value.toString(16)}`;
  }

  /** Numeric value of a constant index expression, if it is one. */
  static constIndex(expr: Expr): number | null {
    if (expr.kind !== 'const') return null;
    const lit = HdlExprUtils.parseLiteral(expr.text);
    return lit === null ? null : Number(lit.value);
  }

  // ---------------------------------------------------------------------------
  // Rendering
  // ---------------------------------------------------------------------------

  static render(expr: Expr): string {
    switch (expr.kind) {
      case 'ref':
        return expr.name;
      case 'const':
        return expr.text;
      case 'unary':
        return `${expr.op}${HdlExprUtils.render(expr.operand)}`;
      case 'binary':
        return `(${HdlExprUtils.render(expr.left)} ${expr.op} ${HdlExprUtils.render(expr.right)})`;
      case 'ternary':
        return (
          `(${HdlExprUtils.render(expr.cond)} ? ${HdlExprUtils.render(expr.whenTrue)} : ` +
          `${HdlExprUtils.render(expr.whenFalse)})`
        );
      case 'select': {
        const base = HdlExprUtils.render(expr.base);
        const msb = HdlExprUtils._renderIndex(expr.msb);
        return expr.lsb === null
          ? `${base}[${msb}]`
          : `${base}[${msb}:${HdlExprUtils._renderIndex(expr.lsb)}]`;
      }
      case 'concat':
        return `{${expr.parts.map((p) => HdlExprUtils.render(p)).join(', ')}}`;
      case 'replicate':
        return `{${HdlExprUtils.render(expr.count)}{${HdlExprUtils.render(expr.value)}}}`;
      case 'call':
        return `${expr.name}(${expr.args.map((a) => HdlExprUtils.render(a)).join(', ')})`;
      case 'opaque':
        return `<${expr.tag}>`;
    }
  }

  private static _renderIndex(expr: Expr): string {
    const n = HdlExprUtils.constIndex(expr);
    return n === null ? HdlExprUtils.render(expr) : String(n);
  }

  // ---------------------------------------------------------------------------
  // Constant folding
  // ---------------------------------------------------------------------------

  /** True when every leaf is a literal (no references, calls or opaque nodes). */
  static isLiteralOnly(expr: Expr): boolean {
    switch (expr.kind) {
      case 'const':
        return true;
      case 'ref':
      case 'call':
      case 'opaque':
        return false;
      case 'unary':
        return HdlExprUtils.isLiteralOnly(expr.operand);
      case 'binary':
        return HdlExprUtils.isLiteralOnly(expr.left) && HdlExprUtils.isLiteralOnly(expr.right);
      case 'ternary':
        return (
          HdlExprUtils.isLiteralOnly(expr.cond) &&
          HdlExprUtils.isLiteralOnly(expr.whenTrue) &&
          HdlExprUtils.isLiteralOnly(expr.whenFalse)
        );
      case 'select':
        return (
          HdlExprUtils.isLiteralOnly(expr.base) &&
          HdlExprUtils.isLiteralOnly(expr.msb) &&
          (expr.lsb === null || HdlExprUtils.isLiteralOnly(expr.lsb))
        );
      case 'concat':
        return expr.parts.every((p) => HdlExprUtils.isLiteralOnly(p));
      case 'replicate':
        return HdlExprUtils.isLiteralOnly(expr.count) && HdlExprUtils.isLiteralOnly(expr.value);
    }
  }

  /**
   * Fold a literal-only expression with at least one operator.
   * Returns null for a bare literal, a non-constant expression, x/z digits,
   * or an operation that cannot be evaluated (division by zero, huge shifts).
   */
  static foldConstant(expr: Expr): string | null {
    if (expr.kind === 'const' || !HdlExprUtils.isLiteralOnly(expr)) return null;
    const lit = HdlExprUtils.evaluate(expr);
    return lit === null ? null : HdlExprUtils.formatLiteral(lit);
  }

  static evaluate(expr: Expr): LiteralValue | null {
    switch (expr.kind) {
      case 'const':
        return HdlExprUtils.parseLiteral(expr.text);
      case 'ref':
      case 'call':
      case 'opaque':
        return null;
      case 'unary': {
        const v = HdlExprUtils.evaluate(expr.operand);
        return v === null ? null : HdlExprUtils._evalUnary(expr.op, v);
      }
      case 'binary': {
        const l = HdlExprUtils.evaluate(expr.left);
        const r = HdlExprUtils.evaluate(expr.right);
        return l === null || r === null ? null : HdlExprUtils._evalBinary(expr.op, l, r);
      }
      case 'ternary': {
        const c = HdlExprUtils.evaluate(expr.cond);
        const t = HdlExprUtils.evaluate(expr.whenTrue);
        const e = HdlExprUtils.evaluate(expr.whenFalse);
        if (c === null || t === null || e === null) return null;
        return fit(c.value !== 0n ? t.value : e.value, widest(t.width, e.width));
      }
      case 'select': {
        const base = HdlExprUtils.evaluate(expr.base);
        const msb = HdlExprUtils.evaluate(expr.msb);
        if (base === null || msb === null) return null;
        if (expr.lsb === null) return fit(base.value >> msb.value, 1);
        const lsb = HdlExprUtils.evaluate(expr.lsb);
        if (lsb === null || msb.value < lsb.value) return null;
        return fit(base.value >> lsb.value, Number(msb.value - lsb.value) + 1);
      }
      case 'concat': {
        let value = 0n;
        let width = 0;
        for (const part of expr.parts) {
          const p = HdlExprUtils.evaluate(part);
          if (p === null || p.width === null) return null;
          value = (value << BigInt(p.width)) | p.value;
          width += p.width;
        }
        return { value, width };
      }
      case 'replicate': {
        const count = HdlExprUtils.evaluate(expr.count);
        const v = HdlExprUtils.evaluate(expr.value);
        if (count === null || v === null || v.width === null) return null;
        let value = 0n;
        for (let i = 0n; i < count.value; i++) value = (value << BigInt(v.width)) | v.value;
        return { value, width: v.width * Number(count.value) };
      }
    }
  }

  private static _evalUnary(op: Extract<Expr, { kind: 'unary' }>['op'], v: LiteralValue): LiteralValue {
    const w = v.width ?? UNSIZED_WIDTH;
    switch (op) {
      case '~':
        return { value: ~v.value & mask(w), width: v.width };
      case '!':
        return bool(v.value === 0n);
      case '-':
        return fit(-v.value, v.width);
      case '&':
        return bool((v.value & mask(w)) === mask(w));
      case '|':
        return bool(v.value !== 0n);
      case '^': {
        let parity = 0n;
        for (let x = v.value & mask(w); x !== 0n; x >>= 1n) parity ^= x & 1n;
        return { value: parity, width: 1 };
      }
    }
  }

  private static _evalBinary(
    op: Extract<Expr, { kind: 'binary' }>['op'],
    l: LiteralValue,
    r: LiteralValue,
  ): LiteralValue | null {
    const w = widest(l.width, r.width);
    switch (op) {
      case '+':
        return fit(l.value + r.value, w);
      case '-':
        return fit(l.value - r.value, w);
      case '*':
        return fit(l.value * r.value, w);
      case '/':
        return r.value === 0n ? null : fit(l.value / r.value, w);
      case '%':
        return r.value === 0n ? null : fit(l.value % r.value, w);
      case '&':
        return fit(l.value & r.value, w);
      case '|':
        return fit(l.value | r.value, w);
      case '^':
        return fit(l.value ^ r.value, w);
      case '==':
        return bool(l.value === r.value);
      case '!=':
        return bool(l.value !== r.value);
      case '<':
        return bool(l.value < r.value);
      case '<=':
        return bool(l.value <= r.value);
      case '>':
        return bool(l.value > r.value);
      case '>=':
        return bool(l.value >= r.value);
      case '<<':
        return r.value > MAX_SHIFT ? null : fit(l.value << r.value, l.width);
      case '>>':
      case '>>>':
        return r.value > MAX_SHIFT ? null : fit(l.value >> r.value, l.width);
      case '&&':
        return bool(l.value !== 0n && r.value !== 0n);
      case '||':
        return bool(l.value !== 0n || r.value !== 0n);
    }
  }

  // ---------------------------------------------------------------------------
  // References
  // ---------------------------------------------------------------------------

  /** Add every referenced name (including select indices and call arguments). */
  static collectRefs(expr: Expr, out: Set<string>): Set<string> {
    switch (expr.kind) {
      case 'ref':
        out.add(expr.name);
        break;
      case 'const':
      case 'opaque':
        break;
      case 'unary':
        HdlExprUtils.collectRefs(expr.operand, out);
        break;
      case 'binary':
        HdlExprUtils.collectRefs(expr.left, out);
        HdlExprUtils.collectRefs(expr.right, out);
        break;
      case 'ternary':
        HdlExprUtils.collectRefs(expr.cond, out);
        HdlExprUtils.collectRefs(expr.whenTrue, out);
        HdlExprUtils.collectRefs(expr.whenFalse, out);
        break;
      case 'select':
        HdlExprUtils.collectRefs(expr.base, out);
        HdlExprUtils.collectRefs(expr.msb, out);
        if (expr.lsb !== null) HdlExprUtils.collectRefs(expr.lsb, out);
        break;
      case 'concat':
        for (const p of expr.parts) HdlExprUtils.collectRefs(p, out);
        break;
      case 'replicate':
        HdlExprUtils.collectRefs(expr.count, out);
        HdlExprUtils.collectRefs(expr.value, out);
        break;
      case 'call':
        for (const a of expr.args) HdlExprUtils.collectRefs(a, out);
        break;
    }
    return out;
  }

  /** Names written by an assignment target (`a`, `a[3]`, `{a, b}`). */
  static targetNets(expr: Expr): string[] {
    switch (expr.kind) {
      case 'ref':
        return [expr.name];
      case 'select':
        return HdlExprUtils.targetNets(expr.base);
      case 'concat':
        return expr.parts.flatMap((p) => HdlExprUtils.targetNets(p));
      default:
        return [];
    }
  }

  /** Call expressions in evaluation order (arguments before the call). */
  static findCalls(expr: Expr): Array<Extract<Expr, { kind: 'call' }>> {
    const calls: Array<Extract<Expr, { kind: 'call' }>> = [];
    const visit = (e: Expr): void => {
      switch (e.kind) {
        case 'call':
          e.args.forEach(visit);
          calls.push(e);
          break;
        case 'unary':
          visit(e.operand);
          break;
        case 'binary':
          visit(e.left);
          visit(e.right);
          break;
        case 'ternary':
          visit(e.cond);
          visit(e.whenTrue);
          visit(e.whenFalse);
          break;
        case 'select':
          visit(e.base);
          visit(e.msb);
          if (e.lsb !== null) visit(e.lsb);
          break;
        case 'concat':
          e.parts.forEach(visit);
          break;
        case 'replicate':
          visit(e.count);
          visit(e.value);
          break;
        case 'ref':
        case 'const':
        case 'opaque':
          break;
      }
    };
    visit(expr);
    return calls;
  }

  // ---------------------------------------------------------------------------
  // Substitution
  // ---------------------------------------------------------------------------

  /** Replace references by name. Unmapped references are kept. */
  static substitute(expr: Expr, map: ReadonlyMap<string, Expr>): Expr {
    const sub = (e: Expr): Expr => HdlExprUtils.substitute(e, map);
    switch (expr.kind) {
      case 'ref':
        return map.get(expr.name) ?? expr;
      case 'const':
      case 'opaque':
        return expr;
      case 'unary':
        return { ...expr, operand: sub(expr.operand) };
      case 'binary':
        return { ...expr, left: sub(expr.left), right: sub(expr.right) };
      case 'ternary':
        return { ...expr, cond: sub(expr.cond), whenTrue: sub(expr.whenTrue), whenFalse: sub(expr.whenFalse) };
      case 'select':
        return { ...expr, base: sub(expr.base), msb: sub(expr.msb), lsb: expr.lsb === null ? null : sub(expr.lsb) };
      case 'concat':
        return { ...expr, parts: expr.parts.map(sub) };
      case 'replicate':
        return { ...expr, count: sub(expr.count), value: sub(expr.value) };
      case 'call':
        return { ...expr, args: expr.args.map(sub) };
    }
  }

  static substituteStmt(stmt: Stmt, map: ReadonlyMap<string, Expr>): Stmt {
    const sub = (e: Expr): Expr => HdlExprUtils.substitute(e, map);
    const subAll = (ss: Stmt[]): Stmt[] => ss.map((s) => HdlExprUtils.substituteStmt(s, map));
    switch (stmt.kind) {
      case 'assign':
        return { ...stmt, target: sub(stmt.target), value: sub(stmt.value) };
      case 'if':
        return {
          ...stmt,
          cond: sub(stmt.cond),
          then: subAll(stmt.then),
          else: stmt.else === null ? null : subAll(stmt.else),
        };
      case 'case':
        return {
          ...stmt,
          selector: sub(stmt.selector),
          items: stmt.items.map((item) => ({ guards: item.guards.map(sub), body: subAll(item.body) })),
        };
      case 'loop':
        return { ...stmt, cond: stmt.cond === null ? null : sub(stmt.cond), body: subAll(stmt.body) };
      case 'taskCall':
        return { ...stmt, args: stmt.args.map(sub) };
      case 'system':
      case 'unknown':
        return stmt;
    }
  }

  // ---------------------------------------------------------------------------
  // Statements
  // ---------------------------------------------------------------------------

  /** Pre-order visit of every statement, including nested branches. */
  static walkStmts(stmts: readonly Stmt[], fn: (s: Stmt) => void): void {
    for (const s of stmts) {
      fn(s);
      switch (s.kind) {
        case 'if':
          HdlExprUtils.walkStmts(s.then, fn);
          if (s.else !== null) HdlExprUtils.walkStmts(s.else, fn);
          break;
        case 'case':
          for (const item of s.items) HdlExprUtils.walkStmts(item.body, fn);
          break;
        case 'loop':
          HdlExprUtils.walkStmts(s.body, fn);
          break;
        default:
          break;
      }
    }
  }

  /** Names assigned anywhere in the statements, in first-seen order. */
  static assignedNets(stmts: readonly Stmt[]): string[] {
    const seen = new Set<string>();
    HdlExprUtils.walkStmts(stmts, (s) => {
      if (s.kind === 'assign') {
        for (const n of HdlExprUtils.targetNets(s.target)) seen.add(n);
      }
    });
    return [...seen];
  }

  /** Names read anywhere in the statements (values, conditions, indices, arguments). */
  static readNets(stmts: readonly Stmt[]): string[] {
    const refs = new Set<string>();
    HdlExprUtils.walkStmts(stmts, (s) => {
      switch (s.kind) {
        case 'assign':
          HdlExprUtils.collectRefs(s.value, refs);
          if (s.target.kind === 'select') {
            HdlExprUtils.collectRefs(s.target.msb, refs);
            if (s.target.lsb !== null) HdlExprUtils.collectRefs(s.target.lsb, refs);
          }
          break;
        case 'if':
          HdlExprUtils.collectRefs(s.cond, refs);
          break;
        case 'case':
          HdlExprUtils.collectRefs(s.selector, refs);
          for (const item of s.items) for (const g of item.guards) HdlExprUtils.collectRefs(g, refs);
          break;
        case 'loop':
          if (s.cond !== null) HdlExprUtils.collectRefs(s.cond, refs);
          break;
        case 'taskCall':
          for (const a of s.args) HdlExprUtils.collectRefs(a, refs);
          break;
        case 'system':
        case 'unknown':
          break;
      }
    });
    return [...refs];
  }

  // ---------------------------------------------------------------------------
  // Bit mapping
  // ---------------------------------------------------------------------------

  /**
   * Bits of a connection expression, LSB first.
   * Returns null when the expression cannot be mapped bit by bit (operators,
   * calls, unsized literals, non-constant selects, unknown names).
   */
  static bitSlices(
    expr: Expr,
    rangeOf: (name: string) => DeclaredRange | null,
  ): BitSlice[] | null {
    switch (expr.kind) {
      case 'ref': {
        const range = rangeOf(expr.name);
        if (range === null) return null;
        if (range.width === 1 && range.msb === range.lsb && range.lsb === 0) {
          return [{ net: expr.name, bit: null }];
        }
        return HdlExprUtils._rangeBits(expr.name, range.lsb, range.msb);
      }
      case 'select': {
        if (expr.base.kind !== 'ref') return null;
        const name = expr.base.name;
        if (rangeOf(name) === null) return null;
        const msb = HdlExprUtils.constIndex(expr.msb);
        if (msb === null) return null;
        if (expr.lsb === null) return [{ net: name, bit: msb }];
        const lsb = HdlExprUtils.constIndex(expr.lsb);
        return lsb === null ? null : HdlExprUtils._rangeBits(name, lsb, msb);
      }
      case 'concat': {
        const bits: BitSlice[] = [];
        for (const part of [...expr.parts].reverse()) {
          const partBits = HdlExprUtils.bitSlices(part, rangeOf);
          if (partBits === null) return null;
          bits.push(...partBits);
        }
        return bits;
      }
      case 'replicate': {
        const count = HdlExprUtils.constIndex(expr.count);
        const inner = HdlExprUtils.bitSlices(expr.value, rangeOf);
        if (count === null || inner === null) return null;
        const bits: BitSlice[] = [];
        for (let i = 0; i < count; i++) bits.push(...inner);
        return bits;
      }
      case 'const': {
        const lit = HdlExprUtils.parseLiteral(expr.text);
        if (lit === null || lit.width === null) return null;
        return new Array<BitSlice>(lit.width).fill(null);
      }
      default:
        return null;
    }
  }

  private static _rangeBits(name: string, lsb: number, msb: number): BitSlice[] {
    const bits: BitSlice[] = [];
    const step = msb >= lsb ? 1 : -1;
    for (let i = lsb; ; i += step) {
      bits.push({ net: name, bit: i });
      if (i === msb) break;
    }
    return bits;
  }
}
