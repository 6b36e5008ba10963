/**
 * hierarchy-resolver.ts
 * Binds instances to module definitions and expands the instance tree from
 * the top modules.
 *
 * Traversal is depth-first with an explicit on-path stack of module indices.
 * A child whose module is already on the stack closes a cycle: the node is
 * kept, marked truncated and not expanded, so depth never exceeds the number
 * of definitions.
 *
 * Top selection, in order:
 *   1. modules named in `topModules`
 *   2. modules the producer flagged as top
 *   3. modules no other module instantiates
 *   4. the first module
 */

import type { BuildConfig } from '../models/build-config.js';
import type {
  HierarchyModel,
  InstanceBinding,
  InstanceNode,
  ResolvedConnection,
  UnresolvedReference,
} from '../models/hierarchy.js';
import type { InstanceDecl, ModuleDef, NormalizedDesign } from '../models/ir.js';
import type { DiagnosticCollector } from '../services/diagnostic-collector.js';
import {
  HierarchyCycleError,
  MalformedAstError,
  UnresolvedReferenceError,
} from '../services/errors.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export class HierarchyResolver {
  private readonly _log: Logger;
  private readonly _requestedTops: string[];

  constructor(cfg: BuildConfig, logger?: Logger) {
    this._log = logger ?? new SilentLogger();
    this._requestedTops = cfg.topModules ?? [];
  }

  /**
   * Throws when exactly one top module was requested and it is missing or
   * was rejected by the normalizer. Everything else is a diagnostic.
   */
  resolve(design: NormalizedDesign, diagnostics: DiagnosticCollector): HierarchyModel {
    const moduleTable = design.modules;
    const moduleIndex = new Map<string, number>();
    moduleTable.forEach((m, i) => moduleIndex.set(m.name, i));

    const unresolved: UnresolvedReference[] = [];
    const bindings = moduleTable.map((mod) =>
      mod.instances.map((inst) => this._bind(mod, inst, moduleTable, moduleIndex, unresolved, diagnostics)),
    );

    const topIndices = this._selectTops(design, moduleIndex, bindings, diagnostics);
    this._log.debug('Top modules selected', {
      tops: topIndices.map((i) => moduleTable[i]?.name ?? ''),
    });

    const reachable = new Set<number>();
    const cycles: string[][] = [];
    const reported = new Set<string>();
    const roots = topIndices.map((idx) =>
      this._expand(idx, moduleTable[idx]?.name ?? '', moduleTable[idx]?.name ?? '', 0, [], {
        moduleTable,
        bindings,
        reachable,
        cycles,
        reported,
        diagnostics,
      }),
    );

    return {
      moduleTable,
      moduleIndex,
      bindings,
      roots,
      reachable: [...reachable].sort((a, b) => a - b),
      unresolved,
      cycles,
    };
  }

  // ---------------------------------------------------------------------------
  // Binding
  // ---------------------------------------------------------------------------

  private _bind(
    parent: ModuleDef,
    inst: InstanceDecl,
    moduleTable: ModuleDef[],
    moduleIndex: ReadonlyMap<string, number>,
    unresolved: UnresolvedReference[],
    diagnostics: DiagnosticCollector,
  ): InstanceBinding {
    const childIndex = moduleIndex.get(inst.moduleName) ?? null;
    const child = childIndex !== null ? moduleTable[childIndex] : undefined;

    if (child === undefined) {
      unresolved.push({ modulePath: parent.name, reference: inst.moduleName });
      diagnostics.add(
        new UnresolvedReferenceError(
          parent.name,
          inst.moduleName,
          `Module "${inst.moduleName}" (instance ${parent.name}.${inst.name}) is not defined`,
        ),
      );
      return {
        instanceName: inst.name,
        moduleName: inst.moduleName,
        childIndex: null,
        connections: inst.connections.map((c) => ({
          port: c.port ?? `#${c.portIndex ?? 0}`,
          direction: 'unknown',
          width: 0,
          expr: c.expr,
          text: c.text,
        })),
        origin: inst.origin,
      };
    }

    const connections: ResolvedConnection[] = [];
    for (const conn of inst.connections) {
      const port =
        conn.port !== null
          ? child.ports.find((p) => p.name === conn.port)
          : conn.portIndex !== null
            ? child.ports[conn.portIndex - 1]
            : undefined;
      if (port === undefined) {
        const portName = conn.port ?? `#${conn.portIndex ?? 0}`;
        unresolved.push({ modulePath: parent.name, reference: `${child.name}.${portName}` });
        diagnostics.add(
          new UnresolvedReferenceError(
            parent.name,
            `${child.name}.${portName}`,
            `Instance ${parent.name}.${inst.name} connects unknown port "${portName}" of "${child.name}"`,
          ),
        );
        continue;
      }
      connections.push({
        port: port.name,
        direction: port.direction,
        width: port.width,
        expr: conn.expr,
        text: conn.text,
      });
    }

    return {
      instanceName: inst.name,
      moduleName: inst.moduleName,
      childIndex,
      connections,
      origin: inst.origin,
    };
  }

  // ---------------------------------------------------------------------------
  // Tops
  // ---------------------------------------------------------------------------

  private _selectTops(
    design: NormalizedDesign,
    moduleIndex: ReadonlyMap<string, number>,
    bindings: InstanceBinding[][],
    diagnostics: DiagnosticCollector,
  ): number[] {
    if (this._requestedTops.length > 0) {
      const found: number[] = [];
      for (const name of this._requestedTops) {
        const idx = moduleIndex.get(name);
        if (idx !== undefined) {
          if (!found.includes(idx)) found.push(idx);
          continue;
        }
        const rejected = design.rejected.find((r) => r.name === name);
        const error =
          rejected !== undefined
            ? new MalformedAstError(name, `Top module "${name}" could not be built: ${rejected.reason}`)
            : new UnresolvedReferenceError(name, name, `Top module "${name}" is not defined`);
        if (this._requestedTops.length === 1) throw error;
        diagnostics.add(error);
      }
      return found;
    }

    const flagged = design.modules.flatMap((m, i) => (m.isTop ? [i] : []));
    if (flagged.length > 0) return flagged;

    const instantiated = new Set<number>();
    bindings.forEach((list, parent) => {
      for (const b of list) {
        if (b.childIndex !== null && b.childIndex !== parent) instantiated.add(b.childIndex);
      }
    });
    const uninstantiated = design.modules.flatMap((_m, i) => (instantiated.has(i) ? [] : [i]));
    if (uninstantiated.length > 0) return uninstantiated;

    return design.modules.length > 0 ? [0] : [];
  }

  // ---------------------------------------------------------------------------
  // Expansion
  // ---------------------------------------------------------------------------

  private _expand(
    moduleIdx: number,
    instanceName: string,
    path: string,
    depth: number,
    onPath: number[],
    state: ExpansionState,
  ): InstanceNode {
    const mod = state.moduleTable[moduleIdx];
    const node: InstanceNode = {
      path,
      instanceName,
      moduleName: mod?.name ?? '',
      moduleIndex: moduleIdx,
      depth,
      unresolved: false,
      truncated: false,
      children: [],
    };
    state.reachable.add(moduleIdx);
    onPath.push(moduleIdx);

    for (const binding of state.bindings[moduleIdx] ?? []) {
      const childPath = `${path}.${binding.instanceName}`;

      if (binding.childIndex === null) {
        node.children.push({
          path: childPath,
          instanceName: binding.instanceName,
          moduleName: binding.moduleName,
          moduleIndex: null,
          depth: depth + 1,
          unresolved: true,
          truncated: false,
          children: [],
        });
        continue;
      }

      const cycleStart = onPath.indexOf(binding.childIndex);
      if (cycleStart >= 0) {
        const cycle = [...onPath.slice(cycleStart), binding.childIndex].map(
          (i) => state.moduleTable[i]?.name ?? '',
        );
        const key = cycle.join('.');
        if (!state.reported.has(key)) {
          state.reported.add(key);
          state.cycles.push(cycle);
          state.diagnostics.add(new HierarchyCycleError(cycle));
          this._log.warn('Instantiation cycle', { path: childPath, cycle: key });
        }
        node.children.push({
          path: childPath,
          instanceName: binding.instanceName,
          moduleName: binding.moduleName,
          moduleIndex: binding.childIndex,
          depth: depth + 1,
          unresolved: false,
          truncated: true,
          children: [],
        });
        continue;
      }

      node.children.push(
        this._expand(binding.childIndex, binding.instanceName, childPath, depth + 1, onPath, state),
      );
    }

    onPath.pop();
    return node;
  }
}

interface ExpansionState {
  moduleTable: ModuleDef[];
  bindings: InstanceBinding[][];
  reachable: Set<number>;
  cycles: string[][];
  reported: Set<string>;
  diagnostics: DiagnosticCollector;
}
