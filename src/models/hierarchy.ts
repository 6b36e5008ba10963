/**
 * hierarchy.ts
 * Instance tree and definition bindings produced by the hierarchy resolver.
 *
 * Instance-to-definition links are indices into `moduleTable`; there are no
 * object back-references, so the tree can never loop.
 */

import type { Expr, ModuleDef, PortDirection } from './ir.js';
import type { Origin } from './origin.js';

export interface ResolvedConnection {
  port: string;
  /** Child port direction; `unknown` when the child is unresolved. */
  direction: PortDirection;
  /** Child port width; 0 when the child is unresolved. */
  width: number;
  expr: Expr | null;
  text: string;
}

/** One instance statement inside a module definition. */
export interface InstanceBinding {
  instanceName: string;
  moduleName: string;
  /** Index into `HierarchyModel.moduleTable`; null when unresolved. */
  childIndex: number | null;
  connections: ResolvedConnection[];
  origin: Origin;
}

export interface InstanceNode {
  /** Full dotted hierarchical path, e.g. `top.u_core.u_alu`. */
  path: string;
  instanceName: string;
  moduleName: string;
  moduleIndex: number | null;
  depth: number;
  /** Child definition was not found. */
  unresolved: boolean;
  /** Expansion stopped because the module is already on the path. */
  truncated: boolean;
  children: InstanceNode[];
}

export interface UnresolvedReference {
  /** Module (or hierarchical path) holding the reference. */
  modulePath: string;
  /** Missing module name, or `module.port` for an unknown port. */
  reference: string;
}

export interface HierarchyModel {
  moduleTable: ModuleDef[];
  moduleIndex: ReadonlyMap<string, number>;
  /** `bindings[i]` lists the instances of `moduleTable[i]`. */
  bindings: InstanceBinding[][];
  roots: InstanceNode[];
  /** Module indices reachable from the roots, ascending. */
  reachable: number[];
  unresolved: UnresolvedReference[];
  /** Each entry lists module names along a cyclic path, first == last. */
  cycles: string[][];
}
