/**
 * build-result.ts
 * Everything a build run returns: the merged model, the graph description
 * and the diagnostics list.
 */

import type { BehavioralModel } from './behavior.js';
import type { BuildConfig } from './build-config.js';
import type { Diagnostic } from './diagnostics.js';
import type { GraphDescription } from './graph-description.js';
import type { HierarchyModel } from './hierarchy.js';
import type { NormalizedDesign } from './ir.js';
import type { StructuralModel } from './structure.js';

export interface BuildStats {
  moduleCount: number;
  rejectedModuleCount: number;
  instanceCount: number;
  netCount: number;
  busEdgeCount: number;
  blockCount: number;
  fragmentCount: number;
  dataFlowEdgeCount: number;
  levelCount: number;
  fatalCount: number;
  errorCount: number;
  warningCount: number;
}

export interface BuildResult {
  design: NormalizedDesign;
  hierarchy: HierarchyModel;
  structure: StructuralModel;
  behavior: BehavioralModel;
  graph: GraphDescription;
  diagnostics: Diagnostic[];
  stats: BuildStats;
}

/** Inputs and outputs written by `--debug` runs (not part of the graph output). */
export interface BuildArtifacts {
  config: BuildConfig;
  result: BuildResult;
}
