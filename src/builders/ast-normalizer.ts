/**
 * ast-normalizer.ts
 * Builds the per-module IR (ModuleDef) from the generic AST trees.
 *
 * Accepted document shapes:
 *   verilator_xml > files > file*          (location file table)
 *   verilator_xml > netlist > module*      (definitions)
 *   verilator_xml > netlist > typetable    (widths referenced by dtype_id)
 *   netlist > ...  |  module               (bare roots)
 *
 * Tags are matched case-insensitively. Verilator names (assigndly, sel,
 * lognot, ...) and the plain names used by hand-written JSON trees
 * (nonblockingassign, bitselect, lnot, ...) map to the same IR.
 *
 * Prohibited:
 *   - Resolving instances to definitions (HierarchyResolver's job)
 *   - Any interpretation of behavior beyond shaping statements
 */

import type { AstNode } from '../models/ast.js';
import type { BuildConfig } from '../models/build-config.js';
import type {
  BinaryOp,
  BlockDecl,
  BlockKind,
  CaseItem,
  Expr,
  FunctionDecl,
  InstanceDecl,
  LoopKind,
  ModuleDef,
  NormalizedDesign,
  PortConnectionDecl,
  PortDirection,
  RejectedModule,
  SensitivityItem,
  Stmt,
  UnaryOp,
} from '../models/ir.js';
import type { Origin } from '../models/origin.js';
import { HdlExprUtils } from '../parsers/hdl/hdl-expr-utils.js';
import type { DiagnosticCollector } from '../services/diagnostic-collector.js';
import { MalformedAstError, UnknownNodeKindWarning } from '../services/errors.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

// ---------------------------------------------------------------------------
// Tag tables
// ---------------------------------------------------------------------------

const UNARY_TAGS: Record<string, UnaryOp> = {
  not: '~',
  lognot: '!',
  lnot: '!',
  negate: '-',
  neg: '-',
  redand: '&',
  redor: '|',
  redxor: '^',
};

const BINARY_TAGS: Record<string, BinaryOp> = {
  add: '+',
  sub: '-',
  mul: '*',
  muls: '*',
  div: '/',
  divs: '/',
  moddiv: '%',
  moddivs: '%',
  mod: '%',
  and: '&',
  or: '|',
  xor: '^',
  eq: '==',
  eqcase: '==',
  neq: '!=',
  neqcase: '!=',
  lt: '<',
  lts: '<',
  lte: '<=',
  ltes: '<=',
  gt: '>',
  gts: '>',
  gte: '>=',
  gtes: '>=',
  shiftl: '<<',
  shl: '<<',
  sll: '<<',
  shiftr: '>>',
  shr: '>>',
  srl: '>>',
  shiftrs: '>>>',
  ashr: '>>>',
  sra: '>>>',
  logand: '&&',
  land: '&&',
  logor: '||',
  lor: '||',
};

const REF_TAGS = new Set(['varref', 'varxref', 'ref', 'signal']);
const CONST_TAGS = new Set(['const', 'number', 'literal']);
const TERNARY_TAGS = new Set(['cond', 'condbound', 'ternary']);
const TRANSPARENT_TAGS = new Set(['extend', 'extends', 'ccast', 'paren']);
const CALL_TAGS = new Set(['funcref', 'call']);
const SELECT_TAGS = new Set(['sel', 'arraysel', 'bitselect', 'partselect']);

const ASSIGN_TAGS = new Set([
  'assign',
  'assigndly',
  'assignw',
  'contassign',
  'assignalias',
  'blockingassign',
  'nonblockingassign',
]);
const NONBLOCKING_TAGS = new Set(['assigndly', 'nonblockingassign']);
const CONT_ASSIGN_TAGS = new Set(['contassign', 'assignw', 'assign', 'assignalias']);
const BLOCK_TAGS = new Set(['begin', 'block', 'namedblock']);
const CASE_TAGS = new Set(['case', 'casez', 'casex']);
const LOOP_TAGS: Record<string, LoopKind> = {
  for: 'for',
  while: 'while',
  repeat: 'repeat',
  forever: 'forever',
};
const TASK_CALL_TAGS = new Set(['taskref', 'taskcall']);
const SYSTEM_TAGS = new Set([
  'display',
  'fdisplay',
  'write',
  'fwrite',
  'monitor',
  'strobe',
  'finish',
  'stop',
  'readmem',
  'fopen',
  'fclose',
  'fflush',
  'systemt',
]);
const ALWAYS_TAGS = new Set(['always', 'always_ff', 'always_comb', 'always_latch', 'alwayspublic']);
const INITIAL_TAGS = new Set(['initial', 'initialstatic', 'final']);
const FUNCTION_TAGS = new Set(['func', 'function', 'task']);
/** Module-level tags that carry nothing this model uses. */
const IGNORED_MODULE_TAGS = new Set(['typedef', 'scope', 'topscope', 'comment']);
/** Document-level siblings of the netlist that carry nothing this model uses. */
const IGNORED_DOCUMENT_TAGS = new Set(['module_files', 'cells']);

const DIRECTIONS: Record<string, PortDirection> = {
  input: 'in',
  in: 'in',
  output: 'out',
  out: 'out',
  inout: 'inout',
};

const EDGE_TYPES: Record<string, SensitivityItem['edge']> = {
  pos: 'posedge',
  posedge: 'posedge',
  neg: 'negedge',
  negedge: 'negedge',
  combo: 'star',
  star: 'star',
  '*': 'star',
};

// ---------------------------------------------------------------------------
// Document context
// ---------------------------------------------------------------------------

interface BitRange {
  msb: number;
  lsb: number;
  width: number;
}

interface DocumentContext {
  sourceName: string;
  /** Verilator file id → file name. */
  files: Map<string, string>;
  /** dtype id → packed range. */
  dtypes: Map<string, BitRange>;
}

const SCALAR: BitRange = { msb: 0, lsb: 0, width: 1 };

function lower(tag: string): string {
  return tag.toLowerCase();
}

function toInt(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') return null;
  const n = Number(value);
  return Number.isInteger(n) ? n : null;
}

function isTruthy(value: string | undefined): boolean {
  return value === '1' || value === 'true';
}

export class AstNormalizer {
  private readonly _log: Logger;

  constructor(_cfg: BuildConfig, logger?: Logger) {
    this._log = logger ?? new SilentLogger();
  }

  /**
   * Normalize every module of every document, in document order.
   * Malformed modules are rejected individually; their siblings still build.
   */
  normalize(
    roots: ReadonlyArray<{ root: AstNode; sourceName: string }>,
    diagnostics: DiagnosticCollector,
  ): NormalizedDesign {
    const modules: ModuleDef[] = [];
    const rejected: RejectedModule[] = [];
    const seen = new Set<string>();

    for (const { root, sourceName } of roots) {
      const ctx: DocumentContext = { sourceName, files: new Map(), dtypes: new Map() };
      const moduleNodes = this._collectModules(root, ctx, diagnostics);
      this._log.debug('Document scanned', { sourceName, modules: moduleNodes.length });

      for (const node of moduleNodes) {
        try {
          const mod = this._buildModule(node, ctx, diagnostics);
          if (seen.has(mod.name)) {
            throw new MalformedAstError(mod.name, `Duplicate definition of module "${mod.name}"`);
          }
          seen.add(mod.name);
          modules.push(mod);
        } catch (err) {
          if (!(err instanceof MalformedAstError)) throw err;
          diagnostics.add(err);
          const name = node.attrs['name'];
          rejected.push({ name: name !== undefined && name !== '' ? name : null, reason: err.message });
          this._log.warn('Module rejected', { name: name ?? null, reason: err.message });
        }
      }
    }

    return { modules, rejected };
  }

  // ---------------------------------------------------------------------------
  // Document structure
  // ---------------------------------------------------------------------------

  private _collectModules(root: AstNode, ctx: DocumentContext, diagnostics: DiagnosticCollector): AstNode[] {
    switch (lower(root.tag)) {
      case 'module':
        return [root];
      case 'netlist':
        return this._collectNetlist(root, ctx, diagnostics);
      case 'verilator_xml': {
        const modules: AstNode[] = [];
        for (const child of root.children) {
          const tag = lower(child.tag);
          if (tag === 'files') {
            this._readFileTable(child, ctx);
          } else if (tag === 'netlist') {
            modules.push(...this._collectNetlist(child, ctx, diagnostics));
          } else if (!IGNORED_DOCUMENT_TAGS.has(tag)) {
            diagnostics.add(new UnknownNodeKindWarning(ctx.sourceName, child.tag));
          }
        }
        return modules;
      }
      default:
        diagnostics.add(new UnknownNodeKindWarning(ctx.sourceName, root.tag));
        return [];
    }
  }

  private _collectNetlist(netlist: AstNode, ctx: DocumentContext, diagnostics: DiagnosticCollector): AstNode[] {
    // The typetable follows the modules in Verilator output; read it first.
    for (const child of netlist.children) {
      if (lower(child.tag) === 'typetable') this._readTypeTable(child, ctx);
    }
    const modules: AstNode[] = [];
    for (const child of netlist.children) {
      const tag = lower(child.tag);
      if (tag === 'module') modules.push(child);
      else if (tag !== 'typetable') diagnostics.add(new UnknownNodeKindWarning(ctx.sourceName, child.tag));
    }
    return modules;
  }

  private _readFileTable(files: AstNode, ctx: DocumentContext): void {
    for (const f of files.children) {
      const id = f.attrs['id'];
      const filename = f.attrs['filename'];
      if (id !== undefined && filename !== undefined) ctx.files.set(id, filename);
    }
  }

  private _readTypeTable(table: AstNode, ctx: DocumentContext): void {
    for (const dtype of table.children) {
      const id = dtype.attrs['id'];
      if (id === undefined) continue;
      const range = this._rangeFromAttrs(dtype.attrs);
      if (range !== null) ctx.dtypes.set(id, range);
    }
  }

  private _rangeFromAttrs(attrs: Record<string, string>): BitRange | null {
    const left = toInt(attrs['left']);
    const right = toInt(attrs['right']);
    if (left !== null && right !== null) {
      return { msb: left, lsb: right, width: Math.abs(left - right) + 1 };
    }
    const width = toInt(attrs['width']);
    if (width !== null && width > 0) return { msb: width - 1, lsb: 0, width };
    return null;
  }

  private _range(node: AstNode, ctx: DocumentContext): BitRange {
    const own = this._rangeFromAttrs(node.attrs);
    if (own !== null) return own;
    const dtypeId = node.attrs['dtype_id'];
    return (dtypeId !== undefined ? ctx.dtypes.get(dtypeId) : undefined) ?? SCALAR;
  }

  private _origin(node: AstNode, ctx: DocumentContext): Origin {
    const loc = node.attrs['loc'];
    if (loc === undefined) return { file: ctx.sourceName };
    const [fileId = '', ...rest] = loc.split(',');
    const [startLine, startCol, endLine, endCol] = rest.map((p) => toInt(p));
    const origin: Origin = { file: ctx.files.get(fileId) ?? fileId };
    if (startLine !== null && startLine !== undefined) origin.startLine = startLine;
    if (startCol !== null && startCol !== undefined) origin.startCol = startCol;
    if (endLine !== null && endLine !== undefined) origin.endLine = endLine;
    if (endCol !== null && endCol !== undefined) origin.endCol = endCol;
    return origin;
  }

  // ---------------------------------------------------------------------------
  // Modules
  // ---------------------------------------------------------------------------

  private _buildModule(node: AstNode, ctx: DocumentContext, diagnostics: DiagnosticCollector): ModuleDef {
    const name = node.attrs['name'];
    if (name === undefined || name === '') {
      throw new MalformedAstError(ctx.sourceName, 'Module definition without a name');
    }

    const mod: ModuleDef = {
      name,
      origin: this._origin(node, ctx),
      isTop: isTruthy(node.attrs['topModule']) || isTruthy(node.attrs['topmodule']),
      ports: [],
      nets: [],
      params: [],
      blocks: [],
      instances: [],
      functions: [],
    };
    const counters: Record<BlockKind, number> = { always: 0, initial: 0, assign: 0 };
    this._readModuleItems(node.children, mod, ctx, counters, diagnostics);

    this._log.debug('Module normalized', {
      name,
      ports: mod.ports.length,
      nets: mod.nets.length,
      blocks: mod.blocks.length,
      instances: mod.instances.length,
    });
    return mod;
  }

  private _readModuleItems(
    items: AstNode[],
    mod: ModuleDef,
    ctx: DocumentContext,
    counters: Record<BlockKind, number>,
    diagnostics: DiagnosticCollector,
  ): void {
    for (const item of items) {
      const tag = lower(item.tag);

      if (tag === 'var') {
        this._readVar(item, mod, ctx);
      } else if (tag === 'instance' || tag === 'cell') {
        const inst = this._readInstance(item, mod.name, ctx);
        if (mod.instances.some((i) => i.name === inst.name)) {
          throw new MalformedAstError(mod.name, `Duplicate instance name "${inst.name}"`);
        }
        mod.instances.push(inst);
      } else if (ALWAYS_TAGS.has(tag)) {
        mod.blocks.push(this._readAlways(item, `always_${counters.always++}`, ctx));
      } else if (INITIAL_TAGS.has(tag)) {
        mod.blocks.push({
          id: `initial_${counters.initial++}`,
          kind: 'initial',
          flavor: tag,
          sensitivity: [],
          body: this._stmts(item.children, ctx),
          origin: this._origin(item, ctx),
        });
      } else if (CONT_ASSIGN_TAGS.has(tag)) {
        mod.blocks.push({
          id: `assign_${counters.assign++}`,
          kind: 'assign',
          flavor: tag,
          sensitivity: [],
          body: [this._assignment(item, true, ctx)],
          origin: this._origin(item, ctx),
        });
      } else if (FUNCTION_TAGS.has(tag)) {
        mod.functions.push(this._readFunction(item, mod.name, ctx));
      } else if (tag === 'begin' || tag === 'generate') {
        // Generate scopes are flattened into the enclosing module.
        this._readModuleItems(item.children, mod, ctx, counters, diagnostics);
      } else if (!IGNORED_MODULE_TAGS.has(tag)) {
        diagnostics.add(new UnknownNodeKindWarning(mod.name, item.tag));
      }
    }
  }

  private _readVar(node: AstNode, mod: ModuleDef, ctx: DocumentContext): void {
    const name = node.attrs['name'];
    const dir = node.attrs['dir'];
    const origin = this._origin(node, ctx);

    if (name === undefined || name === '') {
      throw new MalformedAstError(
        mod.name,
        dir !== undefined ? 'Port declaration without a name' : 'Variable declaration without a name',
      );
    }

    const vartype = lower(node.attrs['vartype'] ?? '');
    if (
      isTruthy(node.attrs['param']) ||
      isTruthy(node.attrs['localparam']) ||
      vartype === 'parameter' ||
      vartype === 'localparam'
    ) {
      const valueNode = node.children[0];
      mod.params.push({ name, value: valueNode !== undefined ? this._expr(valueNode) : null, origin });
      return;
    }

    const range = this._range(node, ctx);
    if (dir !== undefined) {
      mod.ports.push({
        name,
        direction: DIRECTIONS[lower(dir)] ?? 'unknown',
        width: range.width,
        msb: range.msb,
        lsb: range.lsb,
        origin,
      });
    } else {
      mod.nets.push({ name, width: range.width, msb: range.msb, lsb: range.lsb, origin });
    }
  }

  private _readInstance(node: AstNode, moduleName: string, ctx: DocumentContext): InstanceDecl {
    const name = node.attrs['name'] ?? '';
    const def = node.attrs['defName'] ?? node.attrs['submodname'] ?? node.attrs['module'];
    if (name === '') {
      throw new MalformedAstError(moduleName, `Instance of "${def ?? '?'}" without a name`);
    }
    if (def === undefined || def === '') {
      throw new MalformedAstError(moduleName, `Instance "${name}" has no module definition name`);
    }

    const connections: PortConnectionDecl[] = [];
    let ordinal = 0;
    for (const child of node.children) {
      const tag = lower(child.tag);
      if (tag !== 'port' && tag !== 'pin') continue;
      ordinal++;
      const port = child.attrs['name'];
      const exprNode = child.children[0];
      const expr = exprNode !== undefined ? this._expr(exprNode) : null;
      connections.push({
        port: port !== undefined && port !== '' ? port : null,
        portIndex: toInt(child.attrs['portIndex'] ?? child.attrs['pinIndex']) ?? (port === undefined ? ordinal : null),
        expr,
        text: expr !== null ? HdlExprUtils.render(expr) : '',
      });
    }

    return { name, moduleName: def, connections, origin: this._origin(node, ctx) };
  }

  private _readAlways(node: AstNode, id: string, ctx: DocumentContext): BlockDecl {
    const flavor = lower(node.attrs['keyword'] ?? node.tag);
    const sensitivity: SensitivityItem[] = [];
    const body: AstNode[] = [];

    for (const child of node.children) {
      const tag = lower(child.tag);
      if (tag === 'sentree') {
        for (const item of child.children) sensitivity.push(this._senItem(item));
      } else if (tag === 'senitem') {
        sensitivity.push(this._senItem(child));
      } else {
        body.push(child);
      }
    }
    if (sensitivity.length === 0 && flavor === 'always_comb') {
      sensitivity.push({ edge: 'star', signal: null });
    }

    return {
      id,
      kind: 'always',
      flavor,
      sensitivity,
      body: this._stmts(body, ctx),
      origin: this._origin(node, ctx),
    };
  }

  private _senItem(node: AstNode): SensitivityItem {
    const rawEdge = lower(node.attrs['edgeType'] ?? node.attrs['type'] ?? node.attrs['edge'] ?? '');
    const edge = EDGE_TYPES[rawEdge] ?? 'level';
    const refNode = node.children.find((c) => REF_TAGS.has(lower(c.tag)));
    const signal = refNode?.attrs['name'] ?? node.attrs['signal'] ?? null;
    return { edge, signal: edge === 'star' ? null : signal };
  }

  private _readFunction(node: AstNode, moduleName: string, ctx: DocumentContext): FunctionDecl {
    const name = node.attrs['name'];
    if (name === undefined || name === '') {
      throw new MalformedAstError(moduleName, `<${node.tag}> without a name`);
    }
    const kind = lower(node.tag) === 'task' ? 'task' : 'function';
    const returnVar = kind === 'function' ? name : null;
    const params: string[] = [];
    const body: AstNode[] = [];

    for (const child of node.children) {
      if (lower(child.tag) === 'var') {
        const varName = child.attrs['name'];
        const dir = lower(child.attrs['dir'] ?? '');
        if (varName !== undefined && varName !== returnVar && (dir === 'input' || dir === 'inout')) {
          params.push(varName);
        }
      } else {
        body.push(child);
      }
    }

    return { name, kind, params, returnVar, body: this._stmts(body, ctx), origin: this._origin(node, ctx) };
  }

  // ---------------------------------------------------------------------------
  // Statements
  // ---------------------------------------------------------------------------

  private _stmts(nodes: AstNode[], ctx: DocumentContext): Stmt[] {
    const out: Stmt[] = [];
    for (const node of nodes) {
      const tag = lower(node.tag);
      if (BLOCK_TAGS.has(tag)) {
        out.push(...this._stmts(node.children, ctx));
      } else {
        out.push(this._stmt(node, ctx));
      }
    }
    return out;
  }

  private _stmt(node: AstNode, ctx: DocumentContext): Stmt {
    const tag = lower(node.tag);
    const origin = this._origin(node, ctx);

    if (ASSIGN_TAGS.has(tag)) return this._assignment(node, !NONBLOCKING_TAGS.has(tag), ctx);
    if (tag === 'if') return this._if(node, ctx);
    if (CASE_TAGS.has(tag)) return this._case(node, ctx);

    const loopKind = LOOP_TAGS[tag];
    if (loopKind !== undefined) return this._loop(node, loopKind, ctx);

    if (TASK_CALL_TAGS.has(tag)) {
      return { kind: 'taskCall', name: node.attrs['name'] ?? '', args: this._args(node.children), origin };
    }
    if (tag === 'stmtexpr') {
      const inner = node.children[0];
      if (inner !== undefined && CALL_TAGS.has(lower(inner.tag))) {
        return { kind: 'taskCall', name: inner.attrs['name'] ?? '', args: this._args(inner.children), origin };
      }
    }
    if (SYSTEM_TAGS.has(tag)) {
      return { kind: 'system', name: node.attrs['displaytype'] ?? `$${tag}`, origin };
    }
    return { kind: 'unknown', tag: node.tag, origin };
  }

  private _assignment(node: AstNode, blocking: boolean, ctx: DocumentContext): Stmt {
    const origin = this._origin(node, ctx);
    const lhsWrap = node.children.find((c) => lower(c.tag) === 'lhs');
    const rhsWrap = node.children.find((c) => lower(c.tag) === 'rhs');
    const valueNode = rhsWrap?.children[0] ?? (lhsWrap === undefined ? node.children[0] : undefined);
    const targetNode = lhsWrap?.children[0] ?? (rhsWrap === undefined ? node.children.at(-1) : undefined);

    if (valueNode === undefined || targetNode === undefined || node.children.length < 2) {
      return { kind: 'unknown', tag: node.tag, origin };
    }
    return { kind: 'assign', blocking, target: this._expr(targetNode), value: this._expr(valueNode), origin };
  }

  private _if(node: AstNode, ctx: DocumentContext): Stmt {
    const origin = this._origin(node, ctx);
    const condWrap = this._condWrapper(node);
    const thenWrap = this._child(node, 'then');
    const elseWrap = this._child(node, 'else');

    if (condWrap !== undefined || thenWrap !== undefined) {
      const condNode = condWrap?.children[0];
      return {
        kind: 'if',
        cond: condNode !== undefined ? this._expr(condNode) : { kind: 'opaque', tag: 'cond' },
        then: thenWrap !== undefined ? this._stmts(thenWrap.children, ctx) : [],
        else: elseWrap !== undefined ? this._stmts(elseWrap.children, ctx) : null,
        origin,
      };
    }

    const [condNode, thenNode, ...elseNodes] = node.children;
    return {
      kind: 'if',
      cond: condNode !== undefined ? this._expr(condNode) : { kind: 'opaque', tag: 'cond' },
      then: thenNode !== undefined ? this._stmts([thenNode], ctx) : [],
      else: elseNodes.length > 0 ? this._stmts(elseNodes, ctx) : null,
      origin,
    };
  }

  private _case(node: AstNode, ctx: DocumentContext): Stmt {
    const origin = this._origin(node, ctx);
    const exprWrap = this._child(node, 'expr', 'selector');
    const selectorNode = exprWrap?.children[0] ?? node.children[0];
    const items: CaseItem[] = [];

    for (const child of node.children) {
      const tag = lower(child.tag);
      if (tag === 'caseitem') {
        const guards: Expr[] = [];
        const body: AstNode[] = [];
        for (const part of child.children) {
          if (this._isExprTag(part.tag)) guards.push(this._expr(part));
          else body.push(part);
        }
        items.push({ guards, body: this._stmts(body, ctx) });
      } else if (tag === 'item') {
        const value = child.attrs['value'] ?? 'default';
        items.push({
          guards: value === 'default' ? [] : [this._labelExpr(value)],
          body: this._stmts(child.children, ctx),
        });
      }
    }

    return {
      kind: 'case',
      selector: selectorNode !== undefined ? this._expr(selectorNode) : { kind: 'opaque', tag: 'selector' },
      items,
      origin,
    };
  }

  private _loop(node: AstNode, loopKind: LoopKind, ctx: DocumentContext): Stmt {
    const origin = this._origin(node, ctx);
    const condWrap = this._condWrapper(node);
    const bodyWrap = this._child(node, 'body');

    if (condWrap !== undefined || bodyWrap !== undefined) {
      const condNode = condWrap?.children[0];
      return {
        kind: 'loop',
        loopKind,
        cond: loopKind === 'forever' || condNode === undefined ? null : this._expr(condNode),
        body: bodyWrap !== undefined ? this._stmts(bodyWrap.children, ctx) : [],
        origin,
      };
    }

    const [first, ...rest] = node.children;
    const hasCond = loopKind !== 'forever' && first !== undefined && this._isExprTag(first.tag);
    return {
      kind: 'loop',
      loopKind,
      cond: hasCond && first !== undefined ? this._expr(first) : null,
      body: this._stmts(hasCond ? rest : node.children, ctx),
      origin,
    };
  }

  private _child(node: AstNode, ...tags: string[]): AstNode | undefined {
    return node.children.find((c) => tags.includes(lower(c.tag)));
  }

  /** `<cond>` is also Verilator's ternary; a wrapper has exactly one child. */
  private _condWrapper(node: AstNode): AstNode | undefined {
    return node.children.find(
      (c) => (lower(c.tag) === 'cond' || lower(c.tag) === 'condition') && c.children.length === 1,
    );
  }

  /** Case label written as text: identifiers are parameter references, the rest literals. */
  private _labelExpr(text: string): Expr {
    return /^[A-Za-z_][A-Za-z0-9_$]*$/.test(text) ? { kind: 'ref', name: text } : { kind: 'const', text };
  }

  // ---------------------------------------------------------------------------
  // Expressions
  // ---------------------------------------------------------------------------

  private _isExprTag(tag: string): boolean {
    const t = lower(tag);
    return (
      REF_TAGS.has(t) ||
      CONST_TAGS.has(t) ||
      TERNARY_TAGS.has(t) ||
      TRANSPARENT_TAGS.has(t) ||
      CALL_TAGS.has(t) ||
      SELECT_TAGS.has(t) ||
      t === 'concat' ||
      t === 'replicate' ||
      UNARY_TAGS[t] !== undefined ||
      BINARY_TAGS[t] !== undefined
    );
  }

  private _args(nodes: AstNode[]): Expr[] {
    const args: Expr[] = [];
    for (const n of nodes) {
      // Verilator wraps call arguments in <arg>.
      const inner = lower(n.tag) === 'arg' ? n.children[0] : n;
      if (inner !== undefined) args.push(this._expr(inner));
    }
    return args;
  }

  private _expr(node: AstNode): Expr {
    const tag = lower(node.tag);
    const [a, b, c] = node.children;

    if (REF_TAGS.has(tag)) {
      const name = node.attrs['name'] ?? '';
      const dotted = node.attrs['dotted'];
      return { kind: 'ref', name: dotted !== undefined && dotted !== '' ? `${dotted}.${name}` : name };
    }
    if (CONST_TAGS.has(tag)) {
      return { kind: 'const', text: node.attrs['name'] ?? node.attrs['value'] ?? '' };
    }
    if (TRANSPARENT_TAGS.has(tag) && a !== undefined) return this._expr(a);

    const unary = UNARY_TAGS[tag];
    if (unary !== undefined && a !== undefined) return { kind: 'unary', op: unary, operand: this._expr(a) };

    const binary = BINARY_TAGS[tag];
    if (binary !== undefined && a !== undefined && b !== undefined) {
      return { kind: 'binary', op: binary, left: this._expr(a), right: this._expr(b) };
    }
    if (TERNARY_TAGS.has(tag) && a !== undefined && b !== undefined && c !== undefined) {
      return { kind: 'ternary', cond: this._expr(a), whenTrue: this._expr(b), whenFalse: this._expr(c) };
    }
    if (tag === 'concat' && node.children.length > 0) {
      const parts = node.children.map((n) => this._expr(n));
      // Verilator nests binary concats; `{a, {b, c}}` reads as `{a, b, c}`.
      return { kind: 'concat', parts: parts.flatMap((p) => (p.kind === 'concat' ? p.parts : [p])) };
    }
    if (tag === 'replicate' && a !== undefined && b !== undefined) {
      return { kind: 'replicate', value: this._expr(a), count: this._expr(b) };
    }
    if (CALL_TAGS.has(tag)) {
      return { kind: 'call', name: node.attrs['name'] ?? '', args: this._args(node.children) };
    }
    if (SELECT_TAGS.has(tag) && a !== undefined && b !== undefined) {
      return this._select(tag, a, b, c);
    }
    return { kind: 'opaque', tag: node.tag };
  }

  private _select(tag: string, baseNode: AstNode, b: AstNode, c: AstNode | undefined): Expr {
    const base = this._expr(baseNode);
    const first = this._expr(b);

    if (tag === 'arraysel' || tag === 'bitselect' || c === undefined) {
      return { kind: 'select', base, msb: first, lsb: null };
    }
    const second = this._expr(c);
    if (tag === 'partselect') {
      return { kind: 'select', base, msb: first, lsb: second };
    }

    // Verilator <sel>: (base, lsb, width).
    const lsb = HdlExprUtils.constIndex(first);
    const width = HdlExprUtils.constIndex(second);
    if (width === 1) {
      return { kind: 'select', base, msb: lsb !== null ? { kind: 'const', text: String(lsb) } : first, lsb: null };
    }
    if (lsb !== null && width !== null) {
      return {
        kind: 'select',
        base,
        msb: { kind: 'const', text: String(lsb + width - 1) },
        lsb: { kind: 'const', text: String(lsb) },
      };
    }
    return {
      kind: 'select',
      base,
      msb: {
        kind: 'binary',
        op: '+',
        left: first,
        right: { kind: 'binary', op: '-', left: second, right: { kind: 'const', text: '1' } },
      },
      lsb: first,
    };
  }
}
