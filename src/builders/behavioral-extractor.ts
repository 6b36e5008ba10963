/**
 * behavioral-extractor.ts
 * Turns always/initial/assign blocks into control-flow fragments, classifies
 * each block and recognizes finite-state-machine structure.
 *
 * Statement states (recursive descent, branches never merged):
 *   SEQUENTIAL-ASSIGN → AssignmentFragment
 *   CONDITIONAL       → ConditionalFragment (true / false branches)
 *   CASE-DISPATCH     → CaseFragment (one branch per item)
 *   LOOP              → LoopFragment
 * Anything else becomes an OpaqueFragment plus an UnsupportedConstruct
 * diagnostic.
 *
 * Fragment ids are `<blockId>.f<n>`, numbered in pre-order. Function calls
 * are inlined before the statement that contains them, once per call site.
 *
 * Every fragment carries DEF/USE sets over the module's declared nets.
 * Data-flow edges link a DEF to each USE of the same net: inside a block
 * when the definition comes first in pre-order and does not sit in a
 * sibling branch, across blocks always (unless interBlockDataFlow is off).
 */

import type {
  AssignmentFragment,
  BehavioralBlock,
  BehavioralModel,
  BlockClassification,
  DataFlowEdge,
  Fragment,
  FsmHint,
  ModuleBehavior,
  StateAssignment,
} from '../models/behavior.js';
import type { BuildConfig } from '../models/build-config.js';
import type { HierarchyModel } from '../models/hierarchy.js';
import type { BlockDecl, Expr, FunctionDecl, ModuleDef, SensitivityItem, Stmt } from '../models/ir.js';
import type { StructuralModel } from '../models/structure.js';
import { HdlExprUtils } from '../parsers/hdl/hdl-expr-utils.js';
import type { DiagnosticCollector } from '../services/diagnostic-collector.js';
import { UnsupportedConstructError } from '../services/errors.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

const CLOCK_LIKE = /clk|clock|reset|rst/i;
const DATAPATH_OPS = new Set(['+', '-', '*', '&', '|', '^']);
/** More datapath operators than this makes a combinational block a datapath. */
const DATAPATH_OP_THRESHOLD = 3;

interface Inlining {
  name: string;
  invocation: number;
}

interface BlockContext {
  mod: ModuleDef;
  blockId: string;
  params: ReadonlySet<string>;
  signals: ReadonlySet<string>;
  functions: ReadonlyMap<string, FunctionDecl>;
  diagnostics: DiagnosticCollector;
  nextFragment: number;
  nextInvocation: number;
  callStack: string[];
}

/** `(a == b)` stays as is; `a` becomes `(a)`. */
function parenthesize(text: string): string {
  return text.startsWith('(') && text.endsWith(')') ? text : `(${text})`;
}

export function triggerText(sensitivity: readonly SensitivityItem[]): string {
  return sensitivity
    .map((s) => {
      if (s.edge === 'star') return '*';
      if (s.edge === 'level') return s.signal ?? '';
      return `${s.edge} ${s.signal ?? ''}`.trim();
    })
    .join(' or ');
}

export function isSequentialBlock(block: BlockDecl): boolean {
  if (block.kind !== 'always') return false;
  if (block.flavor === 'always_ff') return true;
  if (block.sensitivity.some((s) => s.edge === 'posedge' || s.edge === 'negedge')) return true;
  // Producers that drop edge types still name the clock.
  return block.sensitivity.some((s) => s.edge === 'level' && s.signal !== null && CLOCK_LIKE.test(s.signal));
}

export function preOrderFragments(fragments: readonly Fragment[]): Fragment[] {
  const out: Fragment[] = [];
  const visit = (f: Fragment): void => {
    out.push(f);
    if (f.kind === 'conditional' || f.kind === 'case') {
      for (const b of f.branches) b.fragments.forEach(visit);
    } else if (f.kind === 'loop') {
      f.body.forEach(visit);
    }
  };
  fragments.forEach(visit);
  return out;
}

interface PlacedFragment {
  fragment: Fragment;
  /** Branch taken at each enclosing conditional or case, keyed by its fragment id. */
  branches: Map<string, number>;
}

function placeFragments(fragments: readonly Fragment[]): PlacedFragment[] {
  const out: PlacedFragment[] = [];
  const visit = (f: Fragment, branches: Map<string, number>): void => {
    out.push({ fragment: f, branches });
    if (f.kind === 'conditional' || f.kind === 'case') {
      f.branches.forEach((b, i) => {
        const inner = new Map(branches).set(f.id, i);
        for (const child of b.fragments) visit(child, inner);
      });
    } else if (f.kind === 'loop') {
      for (const child of f.body) visit(child, branches);
    }
  };
  for (const f of fragments) visit(f, new Map());
  return out;
}

/** Sibling branches of one conditional or case never run in the same pass. */
function exclusive(a: PlacedFragment, b: PlacedFragment): boolean {
  for (const [id, branch] of a.branches) {
    const other = b.branches.get(id);
    if (other !== undefined && other !== branch) return true;
  }
  return false;
}

/** DEF → USE edges, ordered by block, then use fragment, then used net, then definition. */
export function dataFlowEdges(blocks: readonly BehavioralBlock[], interBlock: boolean): DataFlowEdge[] {
  const placed = blocks.map((b) => ({ id: b.id, fragments: placeFragments(b.fragments) }));
  const defs = new Map<string, Array<{ block: string; position: number; at: PlacedFragment }>>();

  for (const b of placed) {
    b.fragments.forEach((at, position) => {
      for (const net of at.fragment.defs) {
        const list = defs.get(net) ?? [];
        list.push({ block: b.id, position, at });
        defs.set(net, list);
      }
    });
  }

  const edges: DataFlowEdge[] = [];
  for (const b of placed) {
    b.fragments.forEach((use, position) => {
      for (const net of use.fragment.uses) {
        for (const def of defs.get(net) ?? []) {
          const crossBlock = def.block !== b.id;
          if (crossBlock ? !interBlock : def.position >= position || exclusive(def.at, use)) continue;
          edges.push({ from: def.at.fragment.id, to: use.fragment.id, net, crossBlock });
        }
      }
    });
  }
  return edges;
}

export class BehavioralExtractor {
  private readonly _log: Logger;
  private readonly _fold: boolean;
  private readonly _dataFlow: boolean;
  private readonly _interBlock: boolean;

  constructor(cfg: BuildConfig, logger?: Logger) {
    this._log = logger ?? new SilentLogger();
    this._fold = cfg.foldConstants ?? true;
    this._dataFlow = cfg.dataFlow ?? true;
    this._interBlock = cfg.interBlockDataFlow ?? true;
  }

  extract(
    hierarchy: HierarchyModel,
    structure: StructuralModel,
    diagnostics: DiagnosticCollector,
  ): BehavioralModel {
    const modules: ModuleBehavior[] = [];
    for (const ms of structure.modules) {
      const mod = hierarchy.moduleTable[ms.moduleIndex];
      if (mod === undefined) continue;
      modules.push(this._extractModule(mod, ms.moduleIndex, diagnostics));
    }
    return { modules };
  }

  // ---------------------------------------------------------------------------
  // Per module
  // ---------------------------------------------------------------------------

  private _extractModule(mod: ModuleDef, moduleIndex: number, diagnostics: DiagnosticCollector): ModuleBehavior {
    const params = new Set(mod.params.map((p) => p.name));
    const signals = new Set([...mod.ports.map((p) => p.name), ...mod.nets.map((n) => n.name)]);
    const functions = new Map(mod.functions.map((f) => [f.name, f]));

    const blocks: BehavioralBlock[] = mod.blocks.map((block) => {
      const ctx: BlockContext = {
        mod,
        blockId: block.id,
        params,
        signals,
        functions,
        diagnostics,
        nextFragment: 0,
        nextInvocation: 0,
        callStack: [],
      };
      const fragments = this._fragments(block.body, ctx, null);
      const sequential = isSequentialBlock(block);
      const fsm = block.kind === 'always' ? this._detectFsm(block, fragments, mod) : null;

      return {
        id: block.id,
        kind: block.kind,
        trigger: triggerText(block.sensitivity),
        sequential,
        classification: this._classify(block, fragments, sequential, fsm),
        fragments,
        fsm,
      };
    });

    const dataFlow = this._dataFlow ? dataFlowEdges(blocks, this._interBlock) : [];

    this._log.debug('Module behavior extracted', {
      module: mod.name,
      blocks: blocks.length,
      dataFlow: dataFlow.length,
      fsm: blocks.filter((b) => b.fsm !== null).map((b) => b.id),
    });
    return { moduleName: mod.name, moduleIndex, blocks, dataFlow };
  }

  // ---------------------------------------------------------------------------
  // Statements → fragments
  // ---------------------------------------------------------------------------

  private _fragments(stmts: readonly Stmt[], ctx: BlockContext, inlined: Inlining | null): Fragment[] {
    const out: Fragment[] = [];
    for (const stmt of stmts) {
      for (const expr of this._stmtExprs(stmt)) {
        for (const call of HdlExprUtils.findCalls(expr)) out.push(...this._inlineCall(call, ctx, stmt));
      }
      out.push(...this._fragment(stmt, ctx, inlined));
    }
    return out;
  }

  /** Expressions evaluated by the statement itself (not by nested statements). */
  private _stmtExprs(stmt: Stmt): Expr[] {
    switch (stmt.kind) {
      case 'assign':
        return [stmt.value];
      case 'if':
        return [stmt.cond];
      case 'case':
        return [stmt.selector];
      case 'loop':
        return stmt.cond !== null ? [stmt.cond] : [];
      case 'taskCall':
        return stmt.args;
      case 'system':
      case 'unknown':
        return [];
    }
  }

  private _fragment(stmt: Stmt, ctx: BlockContext, inlined: Inlining | null): Fragment[] {
    if (stmt.kind === 'taskCall') {
      const callee = ctx.functions.get(stmt.name);
      if (callee !== undefined) return this._inline(callee, stmt.args, null, ctx, stmt);
    }

    const base = {
      id: this._nextId(ctx),
      origin: stmt.origin,
      inlinedFrom: inlined?.name ?? null,
      invocation: inlined?.invocation ?? null,
    };

    switch (stmt.kind) {
      case 'assign': {
        const target = HdlExprUtils.render(stmt.target);
        const operator = stmt.blocking ? '=' : '<=';
        const expression = HdlExprUtils.render(stmt.value);
        const used = HdlExprUtils.collectRefs(stmt.value, new Set());
        if (stmt.target.kind === 'select') {
          HdlExprUtils.collectRefs(stmt.target.msb, used);
          if (stmt.target.lsb !== null) HdlExprUtils.collectRefs(stmt.target.lsb, used);
        }
        const fragment: AssignmentFragment = {
          ...base,
          kind: 'assignment',
          defs: this._declared(HdlExprUtils.targetNets(stmt.target), ctx),
          uses: this._declared(used, ctx),
          label: `${target} ${operator} ${expression}`,
          target,
          operator,
          expression,
          folded: this._fold ? HdlExprUtils.foldConstant(stmt.value) : null,
          targetNet: stmt.target.kind === 'ref' ? stmt.target.name : null,
          constantValue: this._isNamedConstant(stmt.value, ctx),
          stateDefining: false,
        };
        return [fragment];
      }
      case 'if': {
        const condition = HdlExprUtils.render(stmt.cond);
        const branches = [{ guard: 'true', fragments: this._fragments(stmt.then, ctx, inlined) }];
        if (stmt.else !== null) {
          branches.push({ guard: 'false', fragments: this._fragments(stmt.else, ctx, inlined) });
        }
        return [
          {
            ...base,
            kind: 'conditional',
            label: `if ${parenthesize(condition)}`,
            defs: [],
            uses: this._declared(HdlExprUtils.collectRefs(stmt.cond, new Set()), ctx),
            condition,
            branches,
          },
        ];
      }
      case 'case': {
        const selector = HdlExprUtils.render(stmt.selector);
        const labelled = stmt.items.filter((i) => i.guards.length > 0);
        return [
          {
            ...base,
            kind: 'case',
            label: `case ${parenthesize(selector)}`,
            defs: [],
            uses: this._declared(HdlExprUtils.collectRefs(stmt.selector, new Set()), ctx),
            selector,
            selectorNet: stmt.selector.kind === 'ref' ? stmt.selector.name : null,
            constantGuards:
              labelled.length > 0 &&
              labelled.every((i) => i.guards.every((g) => this._isNamedConstant(g, ctx))),
            branches: stmt.items.map((item) => ({
              guard: item.guards.length === 0 ? 'default' : item.guards.map((g) => HdlExprUtils.render(g)).join(', '),
              fragments: this._fragments(item.body, ctx, inlined),
            })),
          },
        ];
      }
      case 'loop': {
        const condition = stmt.cond !== null ? HdlExprUtils.render(stmt.cond) : null;
        return [
          {
            ...base,
            kind: 'loop',
            label: condition !== null ? `${stmt.loopKind} ${parenthesize(condition)}` : stmt.loopKind,
            defs: [],
            uses: stmt.cond !== null ? this._declared(HdlExprUtils.collectRefs(stmt.cond, new Set()), ctx) : [],
            loopKind: stmt.loopKind,
            condition,
            body: this._fragments(stmt.body, ctx, inlined),
          },
        ];
      }
      case 'taskCall':
        return [this._opaque(base, `task ${stmt.name}`, `Call to unknown task "${stmt.name}"`, ctx)];
      case 'system':
        return [this._opaque(base, stmt.name, `System task ${stmt.name} is not modelled`, ctx)];
      case 'unknown':
        return [this._opaque(base, stmt.tag, `Unsupported statement <${stmt.tag}>`, ctx)];
    }
  }

  private _opaque(
    base: { id: string; origin: Stmt['origin']; inlinedFrom: string | null; invocation: number | null },
    construct: string,
    message: string,
    ctx: BlockContext,
  ): Fragment {
    ctx.diagnostics.add(new UnsupportedConstructError(`${ctx.mod.name}.${ctx.blockId}`, construct, message));
    return { ...base, kind: 'opaque', label: construct, defs: [], uses: [], construct };
  }

  /** Declared nets among `names`, deduplicated, in first-seen order. */
  private _declared(names: Iterable<string>, ctx: BlockContext): string[] {
    return [...new Set(names)].filter((n) => ctx.signals.has(n));
  }

  private _nextId(ctx: BlockContext): string {
    return `${ctx.blockId}.f${ctx.nextFragment++}`;
  }

  /** Literal, parameter reference, or a name that is not a declared signal. */
  private _isNamedConstant(expr: Expr, ctx: BlockContext): boolean {
    if (expr.kind === 'const') return true;
    if (expr.kind === 'ref') return ctx.params.has(expr.name) || !ctx.signals.has(expr.name);
    return false;
  }

  // ---------------------------------------------------------------------------
  // Inlining
  // ---------------------------------------------------------------------------

  private _inlineCall(call: Extract<Expr, { kind: 'call' }>, ctx: BlockContext, site: Stmt): Fragment[] {
    const callee = ctx.functions.get(call.name);
    if (callee === undefined || callee.kind !== 'function') return [];
    return this._inline(callee, call.args, { kind: 'ref', name: HdlExprUtils.render(call) }, ctx, site);
  }

  private _inline(
    callee: FunctionDecl,
    args: readonly Expr[],
    result: Expr | null,
    ctx: BlockContext,
    site: Stmt,
  ): Fragment[] {
    if (ctx.callStack.includes(callee.name)) {
      const base = { id: this._nextId(ctx), origin: site.origin, inlinedFrom: callee.name, invocation: null };
      return [
        this._opaque(base, `recursive call ${callee.name}`, `Recursive call to "${callee.name}" is not inlined`, ctx),
      ];
    }

    const bindings = new Map<string, Expr>();
    callee.params.forEach((param, i) => {
      const arg = args[i];
      if (arg !== undefined) bindings.set(param, arg);
    });
    if (callee.returnVar !== null && result !== null) bindings.set(callee.returnVar, result);

    const invocation = ++ctx.nextInvocation;
    ctx.callStack.push(callee.name);
    const body = callee.body.map((s) => HdlExprUtils.substituteStmt(s, bindings));
    const fragments = this._fragments(body, ctx, { name: callee.name, invocation });
    ctx.callStack.pop();
    return fragments;
  }

  // ---------------------------------------------------------------------------
  // FSM detection
  // ---------------------------------------------------------------------------

  private _detectFsm(block: BlockDecl, fragments: readonly Fragment[], mod: ModuleDef): FsmHint | null {
    const targets = HdlExprUtils.assignedNets(block.body);

    for (const frag of preOrderFragments(fragments)) {
      if (frag.kind !== 'case' || frag.selectorNet === null || !frag.constantGuards) continue;
      const stateNet = frag.selectorNet;

      const driver = mod.blocks.find((b) => {
        const assigned = HdlExprUtils.assignedNets(b.body);
        return assigned.length === 1 && assigned[0] === stateNet;
      });
      if (driver === undefined) continue;

      const targetNet = this._stateTarget(targets, stateNet, driver);
      if (targetNet === null) continue;

      const stateAssignments: StateAssignment[] = [];
      for (const branch of frag.branches) {
        for (const inner of preOrderFragments(branch.fragments)) {
          if (inner.kind !== 'assignment' || inner.targetNet !== targetNet || !inner.constantValue) continue;
          inner.stateDefining = true;
          stateAssignments.push({
            fragmentId: inner.id,
            branch: branch.guard,
            target: targetNet,
            value: inner.expression,
          });
        }
      }

      return {
        stateNet,
        driverBlock: driver.id,
        targetNet,
        states: frag.branches
          .filter((b) => b.guard !== 'default')
          .map((b) => ({ name: b.guard, guard: `${stateNet} == ${b.guard}` })),
        stateAssignments,
      };
    }
    return null;
  }

  /**
   * Net that receives next-state values: the block's only target, the state
   * net itself, or the next-state net the driver copies into the state net.
   */
  private _stateTarget(targets: readonly string[], stateNet: string, driver: BlockDecl): string | null {
    const only = targets.length === 1 ? targets[0] : undefined;
    if (only !== undefined) return only;
    if (targets.includes(stateNet)) return stateNet;

    let next: string | null = null;
    HdlExprUtils.walkStmts(driver.body, (s) => {
      if (next !== null || s.kind !== 'assign') return;
      if (s.target.kind === 'ref' && s.target.name === stateNet && s.value.kind === 'ref') {
        if (targets.includes(s.value.name)) next = s.value.name;
      }
    });
    return next;
  }

  // ---------------------------------------------------------------------------
  // Classification
  // ---------------------------------------------------------------------------

  private _classify(
    block: BlockDecl,
    fragments: readonly Fragment[],
    sequential: boolean,
    fsm: FsmHint | null,
  ): BlockClassification {
    if (block.kind === 'assign') return 'Continuous Assignment';
    if (block.kind === 'initial') return 'Initialization';

    const hasCase = preOrderFragments(fragments).some((f) => f.kind === 'case');
    if (fsm !== null || (sequential && hasCase)) return 'FSM Controller';
    if (sequential && this._isCounter(block.body)) return 'Counter';
    if (!sequential && (hasCase || this._countDatapathOps(block.body) > DATAPATH_OP_THRESHOLD)) {
      return 'Combinational Datapath';
    }
    return sequential ? 'Sequential Logic' : 'Combinational Logic';
  }

  /** A non-blocking `x <= ... + ...` whose sum reads `x`. */
  private _isCounter(body: readonly Stmt[]): boolean {
    let found = false;
    HdlExprUtils.walkStmts(body, (s) => {
      if (found || s.kind !== 'assign' || s.blocking || s.target.kind !== 'ref') return;
      const name = s.target.name;
      found = this._sums(s.value).some((sum) => HdlExprUtils.collectRefs(sum, new Set()).has(name));
    });
    return found;
  }

  private _sums(expr: Expr): Expr[] {
    const sums: Expr[] = [];
    this._visitExpr(expr, (e) => {
      if (e.kind === 'binary' && e.op === '+') sums.push(e);
    });
    return sums;
  }

  private _countDatapathOps(body: readonly Stmt[]): number {
    let count = 0;
    HdlExprUtils.walkStmts(body, (s) => {
      for (const expr of this._stmtExprs(s)) {
        this._visitExpr(expr, (e) => {
          if (e.kind === 'binary' && DATAPATH_OPS.has(e.op)) count++;
        });
      }
    });
    return count;
  }

  private _visitExpr(expr: Expr, fn: (e: Expr) => void): void {
    fn(expr);
    switch (expr.kind) {
      case 'unary':
        this._visitExpr(expr.operand, fn);
        break;
      case 'binary':
        this._visitExpr(expr.left, fn);
        this._visitExpr(expr.right, fn);
        break;
      case 'ternary':
        this._visitExpr(expr.cond, fn);
        this._visitExpr(expr.whenTrue, fn);
        this._visitExpr(expr.whenFalse, fn);
        break;
      case 'select':
        this._visitExpr(expr.base, fn);
        this._visitExpr(expr.msb, fn);
        if (expr.lsb !== null) this._visitExpr(expr.lsb, fn);
        break;
      case 'concat':
        expr.parts.forEach((p) => this._visitExpr(p, fn));
        break;
      case 'replicate':
        this._visitExpr(expr.count, fn);
        this._visitExpr(expr.value, fn);
        break;
      case 'call':
        expr.args.forEach((a) => this._visitExpr(a, fn));
        break;
      case 'ref':
      case 'const':
      case 'opaque':
        break;
    }
  }
}
