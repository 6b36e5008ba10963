/**
 * graph-emitter.ts
 * Renders one DOT digraph per hierarchy level plus the navigation index.
 *
 * Level contents, in order:
 *   1. own ports           (rarrow for in/out, hexagon for inout)
 *   2. child instances     (box3d, drill-down URL; unresolved dashed red,
 *                           truncated cycles linked to the ancestor level)
 *   3. behavioral blocks   (one cluster each, fragments as a control-flow chain)
 *   4. bus edges           (source × sink per edge; stub point when one side is empty)
 *   5. data-flow edges     (DEF → USE between fragments, labelled with the net)
 *
 * Fragment tooltips carry `file:line`, the DEF/USE sets and the inlined
 * function, one line each.
 *
 * Output depends only on the models: repeated runs are byte-identical.
 * Layout is left to Graphviz.
 */

import type { BehavioralBlock, Fragment, ModuleBehavior } from '../models/behavior.js';
import type { BuildConfig } from '../models/build-config.js';
import type {
  GraphDescription,
  LevelGraph,
  NavigationEntry,
} from '../models/graph-description.js';
import type { HierarchyModel, InstanceNode } from '../models/hierarchy.js';
import type { BusEdge, ModuleStructure, NetEndpoint } from '../models/structure.js';
import { DEFAULT_STYLE } from '../models/style-config.js';
import type { DotAttrs, StyleConfig } from '../models/style-config.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';
import { DotWriter } from './dot-writer.js';
import { buildModulePalette, levelId } from './viz-palette.js';

const PORT_SHAPES: Record<string, string> = {
  in: 'rarrow',
  out: 'rarrow',
  inout: 'hexagon',
  unknown: 'ellipse',
};

interface Chain {
  entry: string;
  exit: string;
}

interface Endpoints {
  sources: string[];
  sinks: string[];
  /** Cluster name for node ids that stand for a block. */
  clusters: Map<string, string>;
}

export function portNodeId(port: string): string {
  return `port:${port}`;
}

export function instanceNodeId(instance: string): string {
  return `inst:${instance}`;
}

/** `data[3:0]` for vectors, the net name for scalars. */
export function busLabel(edge: BusEdge): string {
  const text =
    edge.lsb === null || edge.msb === null
      ? (edge.nets[0] ?? edge.baseName)
      : edge.lsb === edge.msb
        ? `${edge.baseName}[${edge.lsb}]`
        : `${edge.baseName}[${edge.msb}:${edge.lsb}]`;
  return edge.partial ? `${text} (partial)` : text;
}

export function penWidth(width: number, style: StyleConfig): string {
  const raw = style.bus.basePenWidth * (1 + Math.log2(Math.max(1, width)));
  return String(Math.round(Math.min(style.bus.maxPenWidth, raw) * 100) / 100);
}

export function fragmentTooltip(frag: Fragment): string {
  const lines: string[] = [];
  if (frag.origin.file !== '' && frag.origin.startLine !== undefined) {
    lines.push(`${frag.origin.file}:${frag.origin.startLine}`);
  }
  if (frag.defs.length > 0) lines.push(`DEF: ${frag.defs.join(', ')}`);
  if (frag.uses.length > 0) lines.push(`USE: ${frag.uses.join(', ')}`);
  if (frag.inlinedFrom !== null) lines.push(`inlined from ${frag.inlinedFrom}`);
  return lines.join('\n');
}

export class GraphEmitter {
  private readonly _log: Logger;
  private readonly _style: StyleConfig;

  constructor(_cfg: BuildConfig, style?: StyleConfig, logger?: Logger) {
    this._style = style ?? DEFAULT_STYLE;
    this._log = logger ?? new SilentLogger();
  }

  emit(
    hierarchy: HierarchyModel,
    structure: { modules: readonly ModuleStructure[] },
    behavior: { modules: readonly ModuleBehavior[] },
  ): GraphDescription {
    const structures = new Map(structure.modules.map((m) => [m.moduleIndex, m]));
    const behaviors = new Map(behavior.modules.map((m) => [m.moduleIndex, m]));
    const palette = buildModulePalette(hierarchy.moduleTable.map((m) => m.name));

    const levels: LevelGraph[] = [];
    const entries: NavigationEntry[] = [];

    const visit = (node: InstanceNode, parentId: string | null, ancestors: InstanceNode[]): void => {
      const id = levelId(node.path);
      const hasLevel = !node.unresolved && !node.truncated && node.moduleIndex !== null;
      const lineage = [...ancestors, node];

      entries.push({
        id,
        path: node.path,
        moduleName: node.moduleName,
        parentId,
        children: node.children.map((c) => levelId(c.path)),
        unresolved: node.unresolved,
        truncated: node.truncated,
        file: hasLevel ? `${id}.dot` : null,
        linkTarget: this._linkTarget(node, ancestors),
      });

      if (hasLevel && node.moduleIndex !== null) {
        const ms = structures.get(node.moduleIndex);
        const mb = behaviors.get(node.moduleIndex);
        if (ms !== undefined) {
          levels.push({
            id,
            path: node.path,
            moduleName: node.moduleName,
            parentId,
            dot: this._renderLevel(id, node, lineage, ms, mb, palette),
          });
        }
      }

      for (const child of node.children) visit(child, id, lineage);
    };

    for (const root of hierarchy.roots) visit(root, null, []);

    this._log.debug('Graph emitted', { levels: levels.length, entries: entries.length });
    return { levels, index: { roots: hierarchy.roots.map((r) => levelId(r.path)), entries } };
  }

  /** Own level; the nearest ancestor of the same module for a cycle; null when unresolved. */
  private _linkTarget(node: InstanceNode, ancestors: readonly InstanceNode[]): string | null {
    if (node.unresolved) return null;
    if (!node.truncated) return levelId(node.path);
    for (let i = ancestors.length - 1; i >= 0; i--) {
      const a = ancestors[i];
      if (a !== undefined && a.moduleIndex === node.moduleIndex) return levelId(a.path);
    }
    return null;
  }

  // ---------------------------------------------------------------------------
  // Level
  // ---------------------------------------------------------------------------

  private _renderLevel(
    id: string,
    node: InstanceNode,
    lineage: readonly InstanceNode[],
    ms: ModuleStructure,
    mb: ModuleBehavior | undefined,
    palette: Record<string, string>,
  ): string {
    const w = new DotWriter(id);
    w.defaults('graph', {
      ...this._style.graph,
      label: `${node.path} (${node.moduleName})`,
      labelloc: 't',
    });
    w.defaults('node', this._style.node);
    w.defaults('edge', this._style.edge);

    for (const port of ms.ports) {
      const range = port.width > 1 ? ` [${port.msb}:${port.lsb}]` : '';
      w.node(portNodeId(port.name), {
        label: `${port.name}${range}`,
        shape: PORT_SHAPES[port.direction] ?? 'ellipse',
        tooltip: `${port.direction} ${port.name}`,
      });
    }

    node.children.forEach((child) => {
      w.node(instanceNodeId(child.instanceName), this._instanceAttrs(child, lineage, palette));
    });

    for (const block of mb?.blocks ?? []) this._renderBlock(w, block);

    const blockIds = new Set((mb?.blocks ?? []).map((b) => b.id));
    for (const edge of ms.busEdges) this._renderBusEdge(w, edge, ms, blockIds);

    for (const df of mb?.dataFlow ?? []) w.edge(df.from, df.to, { ...this._style.dataFlow, label: df.net });

    return w.toString();
  }

  private _instanceAttrs(
    child: InstanceNode,
    lineage: readonly InstanceNode[],
    palette: Record<string, string>,
  ): DotAttrs {
    const base: DotAttrs = {
      shape: 'box3d',
      tooltip: child.path,
    };
    if (child.unresolved) {
      return {
        ...base,
        label: `${child.instanceName}\n(${child.moduleName})\nunresolved`,
        style: 'dashed',
        color: 'red',
        fontcolor: 'red',
      };
    }

    const target = this._linkTarget(child, lineage);
    const attrs: DotAttrs = {
      ...base,
      label: `${child.instanceName}\n(${child.moduleName})${child.truncated ? '\ncycle' : ''}`,
      style: child.truncated ? 'filled,bold,dashed' : 'filled',
      fillcolor: palette[child.moduleName] ?? 'white',
    };
    if (target !== null) {
      attrs['URL'] = this._style.linkTemplate
        .replace(/\{id\}/g, target)
        .replace(/\{path\}/g, child.path)
        .replace(/\{module\}/g, child.moduleName);
    }
    return attrs;
  }

  // ---------------------------------------------------------------------------
  // Blocks
  // ---------------------------------------------------------------------------

  private _renderBlock(w: DotWriter, block: BehavioralBlock): void {
    const lines = [`${block.id}: ${block.classification}`];
    if (block.trigger !== '') lines.push(`@(${block.trigger})`);
    if (block.fsm !== null) lines.push(`FSM on ${block.fsm.stateNet} (${block.fsm.states.length} states)`);

    w.beginCluster(block.id);
    w.attrs({ label: lines.join('\n'), ...this._style.blocks[block.classification] });

    const entry = `${block.id}.entry`;
    const exit = `${block.id}.exit`;
    w.node(entry, { shape: 'circle', label: '', width: '0.2', style: 'filled', fillcolor: 'black' });
    const chain = this._sequence(w, block.fragments);
    w.node(exit, { shape: 'doublecircle', label: '', width: '0.15', style: 'filled', fillcolor: 'black' });

    if (chain === null) {
      w.edge(entry, exit);
    } else {
      w.edge(entry, chain.entry);
      w.edge(chain.exit, exit);
    }
    w.endCluster();
  }

  private _sequence(w: DotWriter, fragments: readonly Fragment[]): Chain | null {
    let first: Chain | null = null;
    let prev: Chain | null = null;
    for (const frag of fragments) {
      const cur = this._fragment(w, frag);
      if (prev !== null) w.edge(prev.exit, cur.entry);
      first ??= cur;
      prev = cur;
    }
    return first === null || prev === null ? null : { entry: first.entry, exit: prev.exit };
  }

  private _fragment(w: DotWriter, frag: Fragment): Chain {
    const style = this._style.fragments[frag.kind];
    const attrs: DotAttrs = { ...style, style: 'filled', label: this._fragmentLabel(frag) };
    const tooltip = fragmentTooltip(frag);
    if (tooltip !== '') attrs['tooltip'] = tooltip;

    switch (frag.kind) {
      case 'assignment': {
        if (frag.stateDefining) {
          attrs['style'] = 'filled,bold';
          attrs['penwidth'] = '2';
        }
        w.node(frag.id, attrs);
        return { entry: frag.id, exit: frag.id };
      }
      case 'opaque':
        w.node(frag.id, attrs);
        return { entry: frag.id, exit: frag.id };
      case 'conditional':
      case 'case': {
        w.node(frag.id, attrs);
        const merge = `${frag.id}.end`;
        w.node(merge, { shape: 'point', label: '' });
        for (const branch of frag.branches) {
          const edgeLabel = frag.kind === 'conditional' ? (branch.guard === 'true' ? 'T' : 'F') : branch.guard;
          const inner = this._sequence(w, branch.fragments);
          if (inner === null) {
            w.edge(frag.id, merge, { label: edgeLabel });
          } else {
            w.edge(frag.id, inner.entry, { label: edgeLabel });
            w.edge(inner.exit, merge);
          }
        }
        if (frag.kind === 'conditional' && frag.branches.length < 2) {
          w.edge(frag.id, merge, { label: 'F' });
        }
        return { entry: frag.id, exit: merge };
      }
      case 'loop': {
        w.node(frag.id, attrs);
        const done = `${frag.id}.end`;
        w.node(done, { shape: 'point', label: '' });
        const body = this._sequence(w, frag.body);
        if (body !== null) {
          w.edge(frag.id, body.entry, { label: 'T' });
          w.edge(body.exit, frag.id, { style: 'dashed', constraint: 'false' });
        }
        w.edge(frag.id, done, { label: 'F' });
        return { entry: frag.id, exit: done };
      }
    }
  }

  private _fragmentLabel(frag: Fragment): string {
    let label = frag.label;
    if (frag.kind === 'assignment' && frag.folded !== null) label += `\n(= ${frag.folded})`;
    if (frag.inlinedFrom !== null && frag.invocation !== null) label += `\n[${frag.inlinedFrom} #${frag.invocation}]`;
    return label;
  }

  // ---------------------------------------------------------------------------
  // Bus edges
  // ---------------------------------------------------------------------------

  private _renderBusEdge(w: DotWriter, edge: BusEdge, ms: ModuleStructure, blockIds: ReadonlySet<string>): void {
    const members = new Set(edge.nets);
    const endpoints: NetEndpoint[] = ms.nets
      .filter((n) => members.has(n.name) && n.baseName === edge.baseName)
      .flatMap((n) => n.endpoints);
    const { sources, sinks, clusters } = this._classifyEndpoints(endpoints, blockIds);

    const attrs: DotAttrs = {
      label: busLabel(edge),
      penwidth: penWidth(edge.width, this._style),
    };
    if (edge.partial) attrs['style'] = 'dashed';
    if (edge.conflict) attrs['color'] = 'orange';
    if (edge.direction === 'bidirectional') attrs['dir'] = 'both';

    const withCluster = (a: DotAttrs, from: string, to: string): DotAttrs => {
      const out = { ...a };
      const tail = clusters.get(from);
      const head = clusters.get(to);
      if (tail !== undefined) out['ltail'] = `cluster_${tail}`;
      if (head !== undefined) out['lhead'] = `cluster_${head}`;
      return out;
    };

    if (sources.length === 0 || sinks.length === 0) {
      const stub = `bus:${edge.id}`;
      w.node(stub, { shape: 'point', xlabel: busLabel(edge) });
      for (const s of sources) w.edge(s, stub, withCluster(attrs, s, stub));
      for (const t of sinks) w.edge(stub, t, withCluster(attrs, stub, t));
      return;
    }

    for (const s of sources) {
      for (const t of sinks) {
        if (s !== t) w.edge(s, t, withCluster(attrs, s, t));
      }
    }
  }

  /**
   * Sources drive the bus into the level (own inputs, child outputs, driving
   * blocks); sinks consume it. `inout` endpoints are both.
   */
  private _classifyEndpoints(endpoints: readonly NetEndpoint[], blockIds: ReadonlySet<string>): Endpoints {
    const sources: string[] = [];
    const sinks: string[] = [];
    const clusters = new Map<string, string>();
    const add = (list: string[], id: string): void => {
      if (!list.includes(id)) list.push(id);
    };

    for (const ep of endpoints) {
      switch (ep.kind) {
        case 'port': {
          const id = portNodeId(ep.port);
          if (ep.direction === 'in' || ep.direction === 'inout') add(sources, id);
          if (ep.direction === 'out' || ep.direction === 'inout' || ep.direction === 'unknown') add(sinks, id);
          break;
        }
        case 'instance': {
          const id = instanceNodeId(ep.instance);
          if (ep.direction === 'out' || ep.direction === 'inout') add(sources, id);
          if (ep.direction === 'in' || ep.direction === 'inout' || ep.direction === 'unknown') add(sinks, id);
          break;
        }
        case 'block': {
          if (!blockIds.has(ep.block)) break;
          const id = `${ep.block}.entry`;
          clusters.set(id, ep.block);
          add(ep.role === 'driver' ? sources : sinks, id);
          break;
        }
      }
    }
    return { sources, sinks, clusters };
  }
}
