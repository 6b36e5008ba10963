/**
 * behavioral-extractor.test.ts
 *
 * Tests for BehavioralExtractor:
 *   1. Fragment trees and pre-order ids
 *   2. FSM detection: only literal assignments to the target net are state-defining
 *   3. Function/task inlining with call-site invocation numbers
 *   4. Opaque fragments and UnsupportedConstruct diagnostics
 *   5. Block classification and constant folding
 *   6. DEF/USE sets and data-flow edges
 */

import { BehavioralExtractor, isSequentialBlock, preOrderFragments, triggerText } from '../behavioral-extractor.js';
import type { AssignmentFragment, BehavioralBlock, Fragment } from '../../models/behavior.js';
import type { BuildConfig } from '../../models/build-config.js';
import type { HierarchyModel } from '../../models/hierarchy.js';
import type {
  BinaryOp,
  BlockDecl,
  BlockKind,
  Expr,
  FunctionDecl,
  ModuleDef,
  SensitivityItem,
  Stmt,
} from '../../models/ir.js';
import { UNKNOWN_ORIGIN } from '../../models/origin.js';
import type { StructuralModel } from '../../models/structure.js';
import { DiagnosticCollector } from '../../services/diagnostic-collector.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const O = UNKNOWN_ORIGIN;
const ref = (name: string): Expr => ({ kind: 'ref', name });
const c = (text: string): Expr => ({ kind: 'const', text });
const bin = (op: BinaryOp, left: Expr, right: Expr): Expr => ({ kind: 'binary', op, left, right });
const set = (target: string, value: Expr): Stmt => ({ kind: 'assign', blocking: true, target: ref(target), value, origin: O });
const nb = (target: string, value: Expr): Stmt => ({ kind: 'assign', blocking: false, target: ref(target), value, origin: O });

const POSEDGE_CLK: SensitivityItem[] = [{ edge: 'posedge', signal: 'clk' }];
const STAR: SensitivityItem[] = [{ edge: 'star', signal: null }];

function block(id: string, body: Stmt[], sensitivity: SensitivityItem[] = STAR, kind: BlockKind = 'always'): BlockDecl {
  return { id, kind, flavor: kind, sensitivity, body, origin: O };
}

function mod(name: string, blocks: BlockDecl[], extra: Partial<ModuleDef> = {}): ModuleDef {
  return {
    name,
    origin: O,
    isTop: true,
    ports: [],
    nets: [],
    params: [],
    blocks,
    instances: [],
    functions: [],
    ...extra,
  };
}

function signals(...names: string[]): ModuleDef['nets'] {
  return names.map((name) => ({ name, width: 1, msb: 0, lsb: 0, origin: O }));
}

function extract(m: ModuleDef, cfg: Partial<BuildConfig> = {}) {
  const hierarchy: HierarchyModel = {
    moduleTable: [m],
    moduleIndex: new Map([[m.name, 0]]),
    bindings: [[]],
    roots: [],
    reachable: [0],
    unresolved: [],
    cycles: [],
  };
  const structure: StructuralModel = {
    modules: [{ moduleName: m.name, moduleIndex: 0, ports: m.ports, nets: [], instances: [], busEdges: [] }],
  };
  const diagnostics = new DiagnosticCollector('extract');
  const model = new BehavioralExtractor({ projectRoot: '/design', inputFiles: [], ...cfg }).extract(
    hierarchy,
    structure,
    diagnostics,
  );
  const blocks = model.modules[0]?.blocks ?? [];
  const dataFlow = model.modules[0]?.dataFlow ?? [];
  return { blocks, dataFlow, diagnostics: diagnostics.toDiagnostics() };
}

function byId(blocks: readonly BehavioralBlock[], id: string): BehavioralBlock {
  const found = blocks.find((b) => b.id === id);
  if (found === undefined) throw new Error(`no block ${id}`);
  return found;
}

function assignments(fragments: readonly Fragment[]): AssignmentFragment[] {
  const out: AssignmentFragment[] = [];
  for (const f of fragments) {
    if (f.kind === 'assignment') out.push(f);
    else if (f.kind === 'conditional' || f.kind === 'case') f.branches.forEach((b) => out.push(...assignments(b.fragments)));
    else if (f.kind === 'loop') out.push(...assignments(f.body));
  }
  return out;
}

// ---------------------------------------------------------------------------
// Fragments
// ---------------------------------------------------------------------------

describe('BehavioralExtractor fragments', () => {
  it('numbers fragments in pre-order and keeps both branches', () => {
    const body: Stmt[] = [
      { kind: 'if', cond: ref('rst'), then: [nb('q', c("4'h0"))], else: [nb('q', bin('+', ref('q'), ref('STEP')))], origin: O },
    ];
    const { blocks } = extract(mod('counter', [block('always_0', body, POSEDGE_CLK)], { nets: signals('rst', 'q') }));
    const [cond] = byId(blocks, 'always_0').fragments;

    expect(cond).toMatchObject({ id: 'always_0.f0', kind: 'conditional', label: 'if (rst)', condition: 'rst' });
    if (cond?.kind !== 'conditional') throw new Error('expected conditional');
    expect(cond.branches.map((b) => [b.guard, b.fragments.map((f) => [f.id, f.label])])).toEqual([
      ['true', [['always_0.f1', "q <= 4'h0"]]],
      ['false', [['always_0.f2', 'q <= (q + STEP)']]],
    ]);
  });

  it('builds case and loop fragments', () => {
    const body: Stmt[] = [
      {
        kind: 'case',
        selector: ref('sel'),
        items: [
          { guards: [c("2'd0"), c("2'd1")], body: [set('y', ref('a'))] },
          { guards: [], body: [set('y', ref('b'))] },
        ],
        origin: O,
      },
      { kind: 'loop', loopKind: 'for', cond: bin('<', ref('i'), c('4')), body: [set('acc', ref('i'))], origin: O },
      { kind: 'loop', loopKind: 'forever', cond: null, body: [], origin: O },
    ];
    const { blocks } = extract(mod('m', [block('always_0', body)], { nets: signals('sel', 'y', 'a', 'b', 'i', 'acc') }));
    const frags = byId(blocks, 'always_0').fragments;

    expect(frags.map((f) => [f.id, f.kind, f.label])).toEqual([
      ['always_0.f0', 'case', 'case (sel)'],
      ['always_0.f3', 'loop', 'for (i < 4)'],
      ['always_0.f5', 'loop', 'forever'],
    ]);
    const [kase] = frags;
    if (kase?.kind !== 'case') throw new Error('expected case');
    expect(kase.branches.map((b) => b.guard)).toEqual(["2'd0, 2'd1", 'default']);
    expect(kase).toMatchObject({ selectorNet: 'sel', constantGuards: true });
  });
});

// ---------------------------------------------------------------------------
// Data flow
// ---------------------------------------------------------------------------

describe('BehavioralExtractor data flow', () => {
  it('records the declared nets each fragment defines and uses', () => {
    const body: Stmt[] = [
      {
        kind: 'if',
        cond: bin('==', ref('mode'), c('2')),
        then: [set('y', bin('+', ref('a'), ref('K')))],
        else: [
          {
            kind: 'assign',
            blocking: false,
            target: { kind: 'select', base: ref('v'), msb: ref('i'), lsb: null },
            value: ref('a'),
            origin: O,
          },
        ],
        origin: O,
      },
      { kind: 'case', selector: ref('sel'), items: [{ guards: [c("1'b0")], body: [set('y', ref('a'))] }], origin: O },
    ];
    const { blocks, dataFlow } = extract(
      mod('m', [block('always_0', body)], { nets: signals('mode', 'a', 'v', 'i', 'sel', 'y') }),
    );

    expect(preOrderFragments(byId(blocks, 'always_0').fragments).map((f) => [f.id, f.defs, f.uses])).toEqual([
      ['always_0.f0', [], ['mode']],
      ['always_0.f1', ['y'], ['a']],
      ['always_0.f2', ['v'], ['a', 'i']],
      ['always_0.f3', [], ['sel']],
      ['always_0.f4', ['y'], ['a']],
    ]);
    expect(dataFlow).toEqual([]);
  });

  const pipeline = mod(
    'pipe',
    [
      block('always_0', [nb('q', ref('d')), nb('y', ref('q')), nb('d', ref('y'))], POSEDGE_CLK),
      block('always_1', [set('z', bin('&', ref('q'), ref('y')))]),
    ],
    { nets: signals('d', 'q', 'y', 'z') },
  );

  it('links earlier definitions inside a block and every definition across blocks', () => {
    const { dataFlow } = extract(pipeline);

    expect(dataFlow.map((e) => [e.from, e.to, e.net, e.crossBlock])).toEqual([
      ['always_0.f0', 'always_0.f1', 'q', false],
      ['always_0.f1', 'always_0.f2', 'y', false],
      ['always_0.f0', 'always_1.f0', 'q', true],
      ['always_0.f1', 'always_1.f0', 'y', true],
    ]);
  });

  it('drops cross-block edges or all edges when configured', () => {
    expect(extract(pipeline, { interBlockDataFlow: false }).dataFlow.map((e) => [e.from, e.to])).toEqual([
      ['always_0.f0', 'always_0.f1'],
      ['always_0.f1', 'always_0.f2'],
    ]);
    expect(extract(pipeline, { dataFlow: false }).dataFlow).toEqual([]);
  });

  it('does not link definitions in one branch to uses in a sibling branch', () => {
    const body: Stmt[] = [
      { kind: 'if', cond: ref('rst'), then: [nb('q', c("4'h0"))], else: [nb('q', bin('+', ref('q'), c('1')))], origin: O },
      nb('y', ref('q')),
    ];
    const { dataFlow } = extract(mod('m', [block('always_0', body, POSEDGE_CLK)], { nets: signals('rst', 'q', 'y') }));

    expect(dataFlow.map((e) => [e.from, e.to, e.net])).toEqual([
      ['always_0.f1', 'always_0.f3', 'q'],
      ['always_0.f2', 'always_0.f3', 'q'],
    ]);
  });

  it('never links a fragment to itself', () => {
    const m = mod('m', [block('always_0', [nb('q', bin('+', ref('q'), c('1')))], POSEDGE_CLK)], {
      nets: signals('q'),
    });
    const { blocks, dataFlow } = extract(m);

    expect(byId(blocks, 'always_0').fragments[0]).toMatchObject({ defs: ['q'], uses: ['q'] });
    expect(dataFlow).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// FSM
// ---------------------------------------------------------------------------

describe('BehavioralExtractor FSM detection', () => {
  const states = ['IDLE', 'RUN', 'DONE'];
  const fsmModule = mod(
    'ctrl',
    [
      block('always_0', [nb('state', ref('next'))], POSEDGE_CLK),
      block('always_1', [
        {
          kind: 'case',
          selector: ref('state'),
          items: [
            { guards: [ref('IDLE')], body: [set('busy', c("1'b1"))] },
            { guards: [ref('RUN')], body: [set('busy', bin('&', ref('go'), ref('en')))] },
            { guards: [ref('DONE')], body: [set('busy', ref('go'))] },
          ],
          origin: O,
        },
      ]),
    ],
    {
      nets: signals('state', 'next', 'busy', 'go', 'en'),
      params: states.map((name) => ({ name, value: null, origin: O })),
    },
  );

  it('marks exactly the literal assignment to the target net as state-defining', () => {
    const { blocks } = extract(fsmModule);
    const comb = byId(blocks, 'always_1');

    expect(comb.fsm).toEqual({
      stateNet: 'state',
      driverBlock: 'always_0',
      targetNet: 'busy',
      states: [
        { name: 'IDLE', guard: 'state == IDLE' },
        { name: 'RUN', guard: 'state == RUN' },
        { name: 'DONE', guard: 'state == DONE' },
      ],
      stateAssignments: [{ fragmentId: 'always_1.f1', branch: 'IDLE', target: 'busy', value: "1'b1" }],
    });
    expect(assignments(comb.fragments).filter((a) => a.stateDefining).map((a) => a.id)).toEqual(['always_1.f1']);
    expect(comb.classification).toBe('FSM Controller');
  });

  it('leaves the register block unclassified as an FSM', () => {
    const seq = byId(extract(fsmModule).blocks, 'always_0');
    expect(seq.fsm).toBeNull();
    expect(seq.classification).toBe('Sequential Logic');
  });

  it('does not report an FSM when case labels are signals', () => {
    const m = mod(
      'm',
      [
        block('always_0', [nb('state', ref('next'))], POSEDGE_CLK),
        block('always_1', [
          { kind: 'case', selector: ref('state'), items: [{ guards: [ref('go')], body: [set('busy', c('1'))] }], origin: O },
        ]),
      ],
      { nets: signals('state', 'next', 'busy', 'go') },
    );
    expect(byId(extract(m).blocks, 'always_1').fsm).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Inlining
// ---------------------------------------------------------------------------

describe('BehavioralExtractor inlining', () => {
  const inc: FunctionDecl = {
    name: 'inc',
    kind: 'function',
    params: ['x'],
    returnVar: 'inc',
    body: [set('inc', bin('+', ref('x'), c('1')))],
    origin: O,
  };
  const pulse: FunctionDecl = {
    name: 'pulse',
    kind: 'task',
    params: ['v'],
    returnVar: null,
    body: [set('strobe', ref('v'))],
    origin: O,
  };

  it('inlines each call site before the calling statement', () => {
    const body: Stmt[] = [
      set('y', bin('+', { kind: 'call', name: 'inc', args: [ref('a')] }, { kind: 'call', name: 'inc', args: [ref('b')] })),
    ];
    const { blocks } = extract(mod('m', [block('always_0', body)], { functions: [inc], nets: signals('a', 'b', 'y') }));

    expect(byId(blocks, 'always_0').fragments.map((f) => [f.id, f.label, f.inlinedFrom, f.invocation])).toEqual([
      ['always_0.f0', 'inc(a) = (a + 1)', 'inc', 1],
      ['always_0.f1', 'inc(b) = (b + 1)', 'inc', 2],
      ['always_0.f2', 'y = (inc(a) + inc(b))', null, null],
    ]);
  });

  it('inlines task calls in place', () => {
    const body: Stmt[] = [{ kind: 'taskCall', name: 'pulse', args: [c("1'b1")], origin: O }];
    const { blocks, diagnostics } = extract(mod('m', [block('initial_0', body, [], 'initial')], { functions: [pulse] }));

    expect(byId(blocks, 'initial_0').fragments.map((f) => [f.label, f.inlinedFrom, f.invocation])).toEqual([
      ["strobe = 1'b1", 'pulse', 1],
    ]);
    expect(diagnostics).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Opaque
// ---------------------------------------------------------------------------

describe('BehavioralExtractor unsupported statements', () => {
  it('emits opaque fragments with one diagnostic each', () => {
    const body: Stmt[] = [
      { kind: 'system', name: '$display', origin: O },
      { kind: 'taskCall', name: 'nope', args: [], origin: O },
      { kind: 'unknown', tag: 'fork', origin: O },
    ];
    const { blocks, diagnostics } = extract(mod('m', [block('initial_0', body, [], 'initial')]));

    expect(byId(blocks, 'initial_0').fragments.map((f) => [f.id, f.kind, f.label])).toEqual([
      ['initial_0.f0', 'opaque', '$display'],
      ['initial_0.f1', 'opaque', 'task nope'],
      ['initial_0.f2', 'opaque', 'fork'],
    ]);
    expect(diagnostics).toEqual([
      {
        code: 'UnsupportedConstruct',
        severity: 'error',
        stage: 'extract',
        modulePath: 'm.initial_0',
        message: 'System task $display is not modelled',
        construct: '$display',
      },
      {
        code: 'UnsupportedConstruct',
        severity: 'error',
        stage: 'extract',
        modulePath: 'm.initial_0',
        message: 'Call to unknown task "nope"',
        construct: 'task nope',
      },
      {
        code: 'UnsupportedConstruct',
        severity: 'error',
        stage: 'extract',
        modulePath: 'm.initial_0',
        message: 'Unsupported statement <fork>',
        construct: 'fork',
      },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

describe('BehavioralExtractor classification', () => {
  it('classifies by block kind, timing and content', () => {
    const sum = bin('+', bin('+', bin('+', bin('+', ref('a'), ref('b')), ref('c')), ref('d')), ref('e'));
    const m = mod(
      'm',
      [
        block('assign_0', [set('w', ref('a'))], [], 'assign'),
        block('initial_0', [set('w', c('0'))], [], 'initial'),
        block('always_0', [nb('q', bin('+', ref('q'), c('1')))], POSEDGE_CLK),
        block('always_1', [set('y', sum)]),
        block('always_2', [set('y', bin('&', ref('a'), ref('b')))]),
        block('always_3', [nb('q', ref('a'))], POSEDGE_CLK),
      ],
      { nets: signals('a', 'b', 'c', 'd', 'e', 'q', 'w', 'y') },
    );
    expect(extract(m).blocks.map((b) => [b.id, b.classification])).toEqual([
      ['assign_0', 'Continuous Assignment'],
      ['initial_0', 'Initialization'],
      ['always_0', 'Counter'],
      ['always_1', 'Combinational Datapath'],
      ['always_2', 'Combinational Logic'],
      ['always_3', 'Sequential Logic'],
    ]);
  });

  it('folds constant right-hand sides unless disabled', () => {
    const m = mod('m', [block('always_0', [set('y', bin('+', c("4'd3"), c("4'd5")))])], { nets: signals('y') });
    const folded = (cfg: Partial<BuildConfig>): Array<string | null> =>
      assignments(byId(extract(m, cfg).blocks, 'always_0').fragments).map((a) => a.folded);

    expect(folded({})).toEqual(["4'h8"]);
    expect(folded({ foldConstants: false })).toEqual([null]);
  });
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe('behavioral helpers', () => {
  it('renders triggers', () => {
    expect(
      triggerText([
        { edge: 'posedge', signal: 'clk' },
        { edge: 'negedge', signal: 'rst_n' },
      ]),
    ).toBe('posedge clk or negedge rst_n');
    expect(triggerText(STAR)).toBe('*');
    expect(triggerText([{ edge: 'level', signal: 'a' }])).toBe('a');
  });

  it('treats edges, always_ff and clock-named levels as sequential', () => {
    expect(isSequentialBlock(block('always_0', [], POSEDGE_CLK))).toBe(true);
    expect(isSequentialBlock({ ...block('always_0', []), flavor: 'always_ff' })).toBe(true);
    expect(isSequentialBlock(block('always_0', [], [{ edge: 'level', signal: 'clk' }]))).toBe(true);
    expect(isSequentialBlock(block('always_0', [], [{ edge: 'level', signal: 'a' }]))).toBe(false);
    expect(isSequentialBlock(block('assign_0', [], POSEDGE_CLK, 'assign'))).toBe(false);
  });
});
