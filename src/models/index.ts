/**
 * models/index.ts
 * Barrel export for the graph builder's model package.
 */

export type { Origin } from './origin.js';
export { UNKNOWN_ORIGIN } from './origin.js';

export type { AstNode } from './ast.js';

export type {
  UnaryOp,
  BinaryOp,
  Expr,
  LoopKind,
  CaseItem,
  Stmt,
  PortDirection,
  PortDecl,
  NetDecl,
  ParamDecl,
  PortConnectionDecl,
  InstanceDecl,
  BlockKind,
  SensitivityItem,
  BlockDecl,
  FunctionDecl,
  ModuleDef,
  RejectedModule,
  NormalizedDesign,
} from './ir.js';

export type {
  ResolvedConnection,
  InstanceBinding,
  InstanceNode,
  UnresolvedReference,
  HierarchyModel,
} from './hierarchy.js';

export type {
  NetDirection,
  NetEndpoint,
  Net,
  InstanceStructure,
  BusEdge,
  ModuleStructure,
  StructuralModel,
} from './structure.js';

export type {
  AssignmentFragment,
  FragmentBranch,
  ConditionalFragment,
  CaseFragment,
  LoopFragment,
  OpaqueFragment,
  Fragment,
  FragmentKind,
  BlockClassification,
  FsmState,
  StateAssignment,
  FsmHint,
  BehavioralBlock,
  DataFlowEdge,
  ModuleBehavior,
  BehavioralModel,
} from './behavior.js';

export type { LevelGraph, NavigationEntry, NavigationIndex, GraphDescription } from './graph-description.js';

export type { DiagnosticCode, DiagnosticSeverity, PipelineStage, Diagnostic } from './diagnostics.js';

export type { BuildConfig } from './build-config.js';
export type { BuildStats, BuildResult, BuildArtifacts } from './build-result.js';

export type { DotAttrs, StyleConfig } from './style-config.js';
export { DEFAULT_STYLE } from './style-config.js';
