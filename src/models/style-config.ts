/**
 * style-config.ts
 * Emitter styling, loaded from YAML and merged over `DEFAULT_STYLE`.
 */

import type { BlockClassification, FragmentKind } from './behavior.js';

export type DotAttrs = Record<string, string>;

export interface StyleConfig {
  graph: DotAttrs;
  node: DotAttrs;
  edge: DotAttrs;
  /** DEF → USE edges between fragments; the net name becomes the label. */
  dataFlow: DotAttrs;
  blocks: Record<BlockClassification, DotAttrs>;
  fragments: Record<FragmentKind, DotAttrs>;
  /**
   * Drill-down link written on instance nodes. `{id}`, `{path}` and
   * `{module}` are substituted.
   */
  linkTemplate: string;
  bus: {
    /** Pen width of a single-bit edge. */
    basePenWidth: number;
    /** Upper bound for wide buses. */
    maxPenWidth: number;
  };
}

export const DEFAULT_STYLE: StyleConfig = {
  graph: { rankdir: 'LR', fontname: 'Arial', fontsize: '12', compound: 'true' },
  node: { shape: 'box', style: 'filled', fillcolor: 'white', fontname: 'Arial', fontsize: '11' },
  edge: { fontname: 'Arial', fontsize: '9', color: '#555555' },
  dataFlow: { style: 'dashed', color: '#1f77b4', fontcolor: '#1f77b4', constraint: 'false' },
  blocks: {
    'Continuous Assignment': { color: '#d9d9d9', style: 'rounded' },
    Initialization: { color: '#c6dbef', style: 'rounded' },
    'FSM Controller': { color: 'skyblue', style: 'filled,rounded', fillcolor: '#eaf6fd' },
    Counter: { color: 'lightgreen', style: 'filled,rounded', fillcolor: '#effaef' },
    'Combinational Datapath': { color: 'lightcoral', style: 'filled,rounded', fillcolor: '#fdf0f0' },
    'Sequential Logic': { color: 'darkseagreen', style: 'filled,rounded', fillcolor: '#f3f8f3' },
    'Combinational Logic': { color: 'lightgoldenrod', style: 'filled,rounded', fillcolor: '#fcfaec' },
  },
  fragments: {
    assignment: { shape: 'box', fillcolor: 'lightsalmon' },
    conditional: { shape: 'diamond', fillcolor: 'lightcyan', color: 'teal' },
    case: { shape: 'Mdiamond', fillcolor: 'lightcyan', color: 'teal' },
    loop: { shape: 'hexagon', fillcolor: 'lavender' },
    opaque: { shape: 'note', fillcolor: '#e0e0e0', fontcolor: '#444444' },
  },
  linkTemplate: '{id}.svg',
  bus: { basePenWidth: 1, maxPenWidth: 6 },
};
