/**
 * structural-model-builder.ts
 * Expands declarations into bit-level nets and attaches port, instance and
 * block endpoints to them.
 *
 * One ModuleStructure per definition reachable from the roots, in module
 * table order. Bus edges are left empty; BusAggregator fills them.
 *
 * Direction inference only looks at port and instance endpoints:
 *   none → internal, only in → in, only out → out,
 *   in + out or any inout → bidirectional (terminal).
 */

import type { BuildConfig } from '../models/build-config.js';
import type { HierarchyModel, InstanceBinding } from '../models/hierarchy.js';
import type { BlockDecl, Expr, ModuleDef, PortDirection } from '../models/ir.js';
import type {
  InstanceStructure,
  ModuleStructure,
  Net,
  NetDirection,
  NetEndpoint,
  StructuralModel,
} from '../models/structure.js';
import { HdlExprUtils } from '../parsers/hdl/hdl-expr-utils.js';
import type { DeclaredRange } from '../parsers/hdl/hdl-expr-utils.js';
import type { DiagnosticCollector } from '../services/diagnostic-collector.js';
import { UnresolvedReferenceError } from '../services/errors.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

/** `data[3]` declared as a name of its own. */
export const INDEXED_NAME = /^(.+)\[(\d+)\]$/;

interface Declaration {
  name: string;
  range: DeclaredRange;
  /** Bit index → net, or key `null` for a scalar. */
  nets: Map<number | null, Net>;
}

// ---------------------------------------------------------------------------
// Direction helpers
// ---------------------------------------------------------------------------

interface DirectionFlags {
  sawIn: boolean;
  sawOut: boolean;
  sawInout: boolean;
}

function observe(flags: DirectionFlags, direction: PortDirection): void {
  if (direction === 'in') flags.sawIn = true;
  else if (direction === 'out') flags.sawOut = true;
  else if (direction === 'inout') flags.sawInout = true;
}

export function inferDirection(endpoints: readonly NetEndpoint[]): {
  direction: NetDirection;
  conflict: boolean;
} {
  const flags: DirectionFlags = { sawIn: false, sawOut: false, sawInout: false };
  for (const ep of endpoints) {
    if (ep.kind !== 'block') observe(flags, ep.direction);
  }
  const conflict = flags.sawIn && flags.sawOut;
  if (flags.sawInout || conflict) return { direction: 'bidirectional', conflict };
  if (flags.sawIn) return { direction: 'in', conflict: false };
  if (flags.sawOut) return { direction: 'out', conflict: false };
  return { direction: 'internal', conflict: false };
}

/** Printable endpoint, e.g. `self.data[3]`, `u_alu.a[0]`, `block:always_1`. */
export function endpointText(ep: NetEndpoint): string {
  switch (ep.kind) {
    case 'port':
      return `self.${ep.port}${ep.bit === null ? '' : `[${ep.bit}]`}`;
    case 'instance':
      return `${ep.instance}.${ep.port}${ep.bit === null ? '' : `[${ep.bit}]`}`;
    case 'block':
      return `block:${ep.block}`;
  }
}

/**
 * Own ports are seen from inside the definition: an input drives the net.
 * Child ports are seen from outside: an output drives it.
 */
function isDriver(ep: NetEndpoint): boolean {
  switch (ep.kind) {
    case 'block':
      return ep.role === 'driver';
    case 'port':
      return ep.direction === 'in' || ep.direction === 'inout';
    case 'instance':
      return ep.direction === 'out' || ep.direction === 'inout';
  }
}

export class StructuralModelBuilder {
  private readonly _log: Logger;

  constructor(_cfg: BuildConfig, logger?: Logger) {
    this._log = logger ?? new SilentLogger();
  }

  build(hierarchy: HierarchyModel, diagnostics: DiagnosticCollector): StructuralModel {
    const modules: ModuleStructure[] = [];
    for (const idx of hierarchy.reachable) {
      const mod = hierarchy.moduleTable[idx];
      if (mod === undefined) continue;
      modules.push(this._buildModule(mod, idx, hierarchy, diagnostics));
    }
    return { modules };
  }

  // ---------------------------------------------------------------------------
  // Per module
  // ---------------------------------------------------------------------------

  private _buildModule(
    mod: ModuleDef,
    moduleIdx: number,
    hierarchy: HierarchyModel,
    diagnostics: DiagnosticCollector,
  ): ModuleStructure {
    const decls = new Map<string, Declaration>();
    const nets: Net[] = [];

    for (const p of mod.ports) nets.push(...this._declare(p.name, p, decls));
    for (const n of mod.nets) {
      if (decls.has(n.name)) continue; // Verilator repeats port names as vars in some dumps
      nets.push(...this._declare(n.name, n, decls));
    }

    // Own ports
    for (const p of mod.ports) {
      const decl = decls.get(p.name);
      if (decl === undefined) continue;
      for (const [bit, net] of decl.nets) {
        net.endpoints.push({ kind: 'port', port: p.name, bit, direction: p.direction });
      }
    }

    // Child instances
    const params = new Set(mod.params.map((p) => p.name));
    const bindings = hierarchy.bindings[moduleIdx] ?? [];
    for (const binding of bindings) {
      this._connectInstance(mod, binding, hierarchy, decls, params, diagnostics);
    }

    // Behavioral blocks
    for (const block of mod.blocks) this._attachBlock(block, decls);

    for (const net of nets) {
      const { direction, conflict } = inferDirection(net.endpoints);
      net.direction = direction;
      net.directionConflict = conflict;
      net.drivers = net.endpoints.filter(isDriver).map(endpointText);
    }

    const instances: InstanceStructure[] = bindings.map((b) => ({
      name: b.instanceName,
      moduleName: b.moduleName,
      resolved: b.childIndex !== null,
      ports: b.connections.map((c) => ({ port: c.port, direction: c.direction, width: c.width, text: c.text })),
    }));

    this._log.debug('Module structure built', {
      module: mod.name,
      nets: nets.length,
      instances: instances.length,
    });

    return { moduleName: mod.name, moduleIndex: moduleIdx, ports: mod.ports, nets, instances, busEdges: [] };
  }

  private _declare(name: string, range: DeclaredRange, decls: Map<string, Declaration>): Net[] {
    const decl: Declaration = { name, range, nets: new Map() };
    decls.set(name, decl);

    const indexed = INDEXED_NAME.exec(name);
    const scalar = range.width === 1 && range.msb === 0 && range.lsb === 0;
    const created: Net[] = [];

    const make = (bit: number | null): Net => ({
      key: `${name}#${bit ?? 0}`,
      name: bit === null ? name : `${name}[${bit}]`,
      baseName: indexed?.[1] ?? name,
      index: bit === null ? (indexed !== null ? Number(indexed[2]) : null) : bit,
      declaration: name,
      direction: 'internal',
      directionConflict: false,
      endpoints: [],
      drivers: [],
    });

    if (scalar) {
      const net = make(null);
      decl.nets.set(null, net);
      created.push(net);
      return created;
    }

    const lo = Math.min(range.msb, range.lsb);
    const hi = Math.max(range.msb, range.lsb);
    for (let bit = lo; bit <= hi; bit++) {
      const net = make(bit);
      decl.nets.set(bit, net);
      created.push(net);
    }
    return created;
  }

  // ---------------------------------------------------------------------------
  // Instance connections
  // ---------------------------------------------------------------------------

  private _connectInstance(
    mod: ModuleDef,
    binding: InstanceBinding,
    hierarchy: HierarchyModel,
    decls: ReadonlyMap<string, Declaration>,
    params: ReadonlySet<string>,
    diagnostics: DiagnosticCollector,
  ): void {
    const child = binding.childIndex !== null ? hierarchy.moduleTable[binding.childIndex] : undefined;
    const resolved = child !== undefined;
    const rangeOf = (n: string): DeclaredRange | null => decls.get(n)?.range ?? null;

    for (const conn of binding.connections) {
      if (conn.expr === null) continue;

      for (const ref of HdlExprUtils.collectRefs(conn.expr, new Set())) {
        if (!decls.has(ref) && !params.has(ref)) {
          diagnostics.add(
            new UnresolvedReferenceError(
              mod.name,
              ref,
              `Connection ${binding.instanceName}.${conn.port} references undeclared "${ref}"`,
            ),
          );
        }
      }

      const childPort = child?.ports.find((p) => p.name === conn.port);
      const childBits = childPort !== undefined ? this._portBits(childPort) : null;
      const slices = HdlExprUtils.bitSlices(conn.expr, rangeOf);

      if (slices === null) {
        // Not bit-mappable: every referenced net touches the whole port.
        for (const ref of HdlExprUtils.collectRefs(conn.expr, new Set())) {
          for (const net of decls.get(ref)?.nets.values() ?? []) {
            net.endpoints.push({
              kind: 'instance',
              instance: binding.instanceName,
              port: conn.port,
              bit: null,
              direction: conn.direction,
              resolved,
            });
          }
        }
        continue;
      }

      slices.forEach((slice, k) => {
        if (slice === null) return;
        let childBit: number | null;
        if (childBits !== null) {
          if (k >= childBits.length) return;
          childBit = childBits[k] ?? null;
        } else {
          childBit = slices.length === 1 ? null : k;
        }
        const net = this._lookup(decls, slice.net, slice.bit);
        if (net === undefined) return;
        net.endpoints.push({
          kind: 'instance',
          instance: binding.instanceName,
          port: conn.port,
          bit: childBit,
          direction: conn.direction,
          resolved,
        });
      });
    }
  }

  /** Child port bits LSB first; `[null]` for a scalar port. */
  private _portBits(port: DeclaredRange): Array<number | null> {
    if (port.width === 1 && port.msb === 0 && port.lsb === 0) return [null];
    const bits: number[] = [];
    const step = port.msb >= port.lsb ? 1 : -1;
    for (let i = port.lsb; ; i += step) {
      bits.push(i);
      if (i === port.msb) break;
    }
    return bits;
  }

  private _lookup(decls: ReadonlyMap<string, Declaration>, name: string, bit: number | null): Net | undefined {
    const decl = decls.get(name);
    if (decl === undefined) return undefined;
    return decl.nets.get(bit) ?? (decl.nets.size === 1 ? decl.nets.get(null) : undefined);
  }

  // ---------------------------------------------------------------------------
  // Blocks
  // ---------------------------------------------------------------------------

  private _attachBlock(block: BlockDecl, decls: ReadonlyMap<string, Declaration>): void {
    const rangeOf = (n: string): DeclaredRange | null => decls.get(n)?.range ?? null;
    const driven = new Set<Net>();
    const read = new Set<Net>();

    HdlExprUtils.walkStmts(block.body, (s) => {
      if (s.kind !== 'assign') return;
      for (const net of this._targetNets(s.target, decls, rangeOf)) driven.add(net);
    });
    for (const name of HdlExprUtils.readNets(block.body)) {
      for (const net of decls.get(name)?.nets.values() ?? []) read.add(net);
    }

    for (const net of driven) net.endpoints.push({ kind: 'block', block: block.id, role: 'driver' });
    for (const net of read) net.endpoints.push({ kind: 'block', block: block.id, role: 'reader' });
  }

  /** Bit-precise for constant selects, whole declaration otherwise. */
  private _targetNets(
    target: Expr,
    decls: ReadonlyMap<string, Declaration>,
    rangeOf: (name: string) => DeclaredRange | null,
  ): Net[] {
    const slices = HdlExprUtils.bitSlices(target, rangeOf);
    if (slices !== null) {
      const nets: Net[] = [];
      for (const slice of slices) {
        if (slice === null) continue;
        const net = this._lookup(decls, slice.net, slice.bit);
        if (net !== undefined) nets.push(net);
      }
      return nets;
    }
    return HdlExprUtils.targetNets(target).flatMap((n) => [...(decls.get(n)?.nets.values() ?? [])]);
  }
}
