/**
 * behavior.ts
 * Control-flow fragments extracted from behavioral blocks.
 *
 * `Fragment` is a tagged union; renderers switch on `kind` and must handle
 * every member.
 */

import type { BlockKind, LoopKind } from './ir.js';
import type { Origin } from './origin.js';

interface FragmentBase {
  /** Unique within the module, e.g. `always_0.f3`. */
  id: string;
  label: string;
  origin: Origin;
  /** Function or task whose body produced this fragment. */
  inlinedFrom: string | null;
  /** 1-based call-site counter within the block, when inlined. */
  invocation: number | null;
  /** Declared nets this fragment writes (DEF). */
  defs: string[];
  /** Declared nets read by this fragment's own expression, not by nested fragments (USE). */
  uses: string[];
}

export interface AssignmentFragment extends FragmentBase {
  kind: 'assignment';
  target: string;
  operator: '=' | '<=';
  /** Right-hand side as written. */
  expression: string;
  /** Folded literal when the right-hand side is compile-time constant. */
  folded: string | null;
  /** Net name when the target is a plain reference. */
  targetNet: string | null;
  /** Right-hand side is a literal or a parameter reference. */
  constantValue: boolean;
  /** Set by FSM detection. */
  stateDefining: boolean;
}

export interface FragmentBranch {
  /** `true`/`false` for conditionals, label text or `default` for cases. */
  guard: string;
  fragments: Fragment[];
}

export interface ConditionalFragment extends FragmentBase {
  kind: 'conditional';
  condition: string;
  branches: FragmentBranch[];
}

export interface CaseFragment extends FragmentBase {
  kind: 'case';
  selector: string;
  /** Net name when the selector is a plain reference. */
  selectorNet: string | null;
  /** Every non-default label is a literal or a parameter reference. */
  constantGuards: boolean;
  branches: FragmentBranch[];
}

export interface LoopFragment extends FragmentBase {
  kind: 'loop';
  loopKind: LoopKind;
  condition: string | null;
  body: Fragment[];
}

export interface OpaqueFragment extends FragmentBase {
  kind: 'opaque';
  construct: string;
}

export type Fragment =
  | AssignmentFragment
  | ConditionalFragment
  | CaseFragment
  | LoopFragment
  | OpaqueFragment;

export type FragmentKind = Fragment['kind'];

export type BlockClassification =
  | 'Continuous Assignment'
  | 'Initialization'
  | 'FSM Controller'
  | 'Counter'
  | 'Combinational Datapath'
  | 'Sequential Logic'
  | 'Combinational Logic';

export interface FsmState {
  /** Case label as written. */
  name: string;
  /** Guard condition, e.g. `state == IDLE`. */
  guard: string;
}

export interface StateAssignment {
  fragmentId: string;
  /** Guard of the case branch holding the assignment. */
  branch: string;
  target: string;
  value: string;
}

export interface FsmHint {
  /** Selector net of the dispatching case. */
  stateNet: string;
  /** Block whose only assignment target is the state net. */
  driverBlock: string;
  /** Net receiving the state-defining assignments. */
  targetNet: string;
  states: FsmState[];
  stateAssignments: StateAssignment[];
}

export interface BehavioralBlock {
  id: string;
  kind: BlockKind;
  /** `posedge clk or negedge rst_n`, `*`, or empty. */
  trigger: string;
  sequential: boolean;
  classification: BlockClassification;
  fragments: Fragment[];
  fsm: FsmHint | null;
}

/**
 * A DEF of `net` in one fragment reaching a USE in another. Inside a block
 * the definition precedes the use in pre-order and is not in a sibling
 * branch; across blocks any definition reaches any use.
 */
export interface DataFlowEdge {
  from: string;
  to: string;
  net: string;
  crossBlock: boolean;
}

export interface ModuleBehavior {
  moduleName: string;
  moduleIndex: number;
  blocks: BehavioralBlock[];
  dataFlow: DataFlowEdge[];
}

export interface BehavioralModel {
  modules: ModuleBehavior[];
}
