/**
 * bus-aggregator.ts
 * Collapses bit nets into bus edges.
 *
 * Grouping:
 *   key      = (module scope, base name); scalars form their own group
 *   order    = ascending bit index
 *   run      = contiguous indices whose endpoint signatures match
 *   partial  = unconnected run of a group that has connected runs
 *
 * The signature of a bit lists its port and instance endpoints with the
 * offset `endpointBit - netIndex`, so `data[1:0] → u.p[1:0]` has the same
 * signature on both bits. Block endpoints are ignored.
 *
 * Edges are derived from nets alone; running the aggregator on its own
 * output produces the same edges.
 */

import type { BuildConfig } from '../models/build-config.js';
import type {
  BusEdge,
  ModuleStructure,
  Net,
  NetDirection,
  StructuralModel,
} from '../models/structure.js';
import type { DiagnosticCollector } from '../services/diagnostic-collector.js';
import { BusGroupingConflictError } from '../services/errors.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';
import { INDEXED_NAME } from './structural-model-builder.js';

/** Signature of one bit: sorted endpoint keys. */
export function bitSignature(net: Net): string[] {
  const keys: string[] = [];
  for (const ep of net.endpoints) {
    if (ep.kind === 'block') continue;
    const owner = ep.kind === 'port' ? 'self' : ep.instance;
    const offset = ep.bit === null ? '*' : String(ep.bit - (net.index ?? 0));
    keys.push(`${owner}.${ep.port}[${offset}]`);
  }
  return keys.sort();
}

export function mergeDirections(directions: readonly NetDirection[]): NetDirection {
  let sawIn = false;
  let sawOut = false;
  for (const d of directions) {
    if (d === 'bidirectional') return 'bidirectional';
    if (d === 'in') sawIn = true;
    if (d === 'out') sawOut = true;
  }
  if (sawIn && sawOut) return 'bidirectional';
  if (sawIn) return 'in';
  if (sawOut) return 'out';
  return 'internal';
}

interface Run {
  nets: Net[];
  signature: string[];
}

export class BusAggregator {
  private readonly _log: Logger;

  constructor(_cfg: BuildConfig, logger?: Logger) {
    this._log = logger ?? new SilentLogger();
  }

  /** Returns a new model whose modules carry freshly derived `busEdges`. */
  aggregate(model: StructuralModel, diagnostics: DiagnosticCollector): StructuralModel {
    return {
      modules: model.modules.map((m) => ({ ...m, busEdges: this._moduleEdges(m, diagnostics) })),
    };
  }

  // ---------------------------------------------------------------------------
  // Per module
  // ---------------------------------------------------------------------------

  private _moduleEdges(mod: ModuleStructure, diagnostics: DiagnosticCollector): BusEdge[] {
    const groups = new Map<string, Net[]>();
    for (const net of mod.nets) {
      const key = net.index === null ? `${net.baseName}` : `${net.baseName}[]`;
      const list = groups.get(key);
      if (list === undefined) groups.set(key, [net]);
      else list.push(net);
    }

    const edges: BusEdge[] = [];
    for (const nets of groups.values()) {
      edges.push(...this._groupEdges(mod.moduleName, nets, diagnostics));
    }

    this._log.debug('Bus edges derived', {
      module: mod.moduleName,
      nets: mod.nets.length,
      edges: edges.length,
    });
    return edges;
  }

  private _groupEdges(scope: string, nets: Net[], diagnostics: DiagnosticCollector): BusEdge[] {
    const first = nets[0];
    if (first === undefined) return [];

    if (first.index === null) {
      // Scalars: one edge per net.
      return nets.map((net) => this._edge(scope, { nets: [net], signature: bitSignature(net) }, false, false));
    }

    const conflicting = this._findConflicts(scope, first.baseName, nets, diagnostics);
    const clean = nets
      .filter((n) => !conflicting.has(n))
      .sort((a, b) => (a.index ?? 0) - (b.index ?? 0) || a.declaration.localeCompare(b.declaration));

    const runs: Run[] = [];
    for (const net of clean) {
      const signature = bitSignature(net);
      const last = runs.at(-1);
      const prev = last?.nets.at(-1);
      if (
        last !== undefined &&
        prev !== undefined &&
        (prev.index ?? 0) + 1 === net.index &&
        last.signature.join('|') === signature.join('|')
      ) {
        last.nets.push(net);
      } else {
        runs.push({ nets: [net], signature });
      }
    }

    const anyConnected = runs.some((r) => r.signature.length > 0);
    const edges = runs.map((r) => this._edge(scope, r, anyConnected && r.signature.length === 0, false));
    for (const net of conflicting) {
      edges.push(this._edge(scope, { nets: [net], signature: bitSignature(net) }, false, true));
    }

    return edges.sort((a, b) => (a.lsb ?? 0) - (b.lsb ?? 0) || a.id.localeCompare(b.id));
  }

  /**
   * Bits that cannot be grouped: indices claimed by more than one
   * declaration, and every bit of a `base[i]`-named declaration wider than
   * one bit.
   */
  private _findConflicts(
    scope: string,
    baseName: string,
    nets: readonly Net[],
    diagnostics: DiagnosticCollector,
  ): Set<Net> {
    const conflicting = new Set<Net>();

    const byDecl = new Map<string, Net[]>();
    for (const net of nets) {
      const list = byDecl.get(net.declaration);
      if (list === undefined) byDecl.set(net.declaration, [net]);
      else list.push(net);
    }
    for (const [decl, declNets] of byDecl) {
      if (INDEXED_NAME.test(decl) && declNets.length > 1) {
        for (const n of declNets) conflicting.add(n);
        diagnostics.add(
          new BusGroupingConflictError(
            scope,
            baseName,
            `Declaration "${decl}" is named like a bit of "${baseName}" but is ${declNets.length} bits wide`,
          ),
        );
      }
    }

    const byIndex = new Map<number, Net[]>();
    for (const net of nets) {
      if (net.index === null) continue;
      const list = byIndex.get(net.index);
      if (list === undefined) byIndex.set(net.index, [net]);
      else list.push(net);
    }
    for (const [index, claimants] of byIndex) {
      const declarations = [...new Set(claimants.map((n) => n.declaration))];
      if (declarations.length < 2) continue;
      for (const n of claimants) conflicting.add(n);
      diagnostics.add(
        new BusGroupingConflictError(
          scope,
          baseName,
          `Bit ${baseName}[${index}] is declared by ${declarations.map((d) => `"${d}"`).join(' and ')}`,
        ),
      );
    }

    return conflicting;
  }

  private _edge(scope: string, run: Run, partial: boolean, conflict: boolean): BusEdge {
    const head = run.nets[0];
    const tail = run.nets.at(-1);
    const baseName = head?.baseName ?? '';
    const lsb = head?.index ?? null;
    const msb = tail?.index ?? null;

    let id: string;
    if (lsb === null || msb === null) id = `${scope}:${head?.name ?? baseName}`;
    else id = `${scope}:${baseName}[${msb}:${lsb}]`;
    if (conflict && head !== undefined) id += `@${head.declaration}`;

    return {
      id,
      scope,
      baseName,
      lsb,
      msb,
      width: run.nets.length,
      nets: run.nets.map((n) => n.name),
      partial,
      connected: run.signature.length > 0,
      pattern: run.signature,
      direction: mergeDirections(run.nets.map((n) => n.direction)),
      conflict,
    };
  }
}
