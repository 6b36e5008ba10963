/**
 * graph-description.ts
 * Declarative output handed to the external layout engine and the
 * navigation shell.
 */

/** One self-contained DOT digraph for a hierarchy level. */
export interface LevelGraph {
  /** Stable id derived from the hierarchical path. */
  id: string;
  path: string;
  moduleName: string;
  parentId: string | null;
  dot: string;
}

export interface NavigationEntry {
  id: string;
  path: string;
  moduleName: string;
  parentId: string | null;
  children: string[];
  unresolved: boolean;
  truncated: boolean;
  /** DOT file name for levels that have a graph, otherwise null. */
  file: string | null;
  /** Level to open on drill-down (the ancestor level for a truncated cycle). */
  linkTarget: string | null;
}

export interface NavigationIndex {
  roots: string[];
  entries: NavigationEntry[];
}

export interface GraphDescription {
  levels: LevelGraph[];
  index: NavigationIndex;
}
