/**
 * structure.ts
 * Bit-level connectivity model and bus edges.
 */

import type { PortDecl, PortDirection } from './ir.js';

/**
 * Classification of a net from the directions of the ports it touches.
 * `bidirectional` is terminal: it is never narrowed again within a build.
 */
export type NetDirection = 'internal' | 'in' | 'out' | 'bidirectional';

export type NetEndpoint =
  | { kind: 'port'; port: string; bit: number | null; direction: PortDirection }
  | {
      kind: 'instance';
      instance: string;
      port: string;
      /** Child port bit, or null when the connection is not bit-mappable. */
      bit: number | null;
      direction: PortDirection;
      resolved: boolean;
    }
  | { kind: 'block'; block: string; role: 'driver' | 'reader' };

export interface Net {
  /** Unique within the module: `<declaration>#<index>`. */
  key: string;
  /** Display name: `data[3]` for vector bits, the plain name for scalars. */
  name: string;
  baseName: string;
  /** Bit index, null for scalars. */
  index: number | null;
  /** Name of the declaration the bit came from. */
  declaration: string;
  direction: NetDirection;
  /** Set when `bidirectional` came from mixed in/out rather than an inout port. */
  directionConflict: boolean;
  endpoints: NetEndpoint[];
  /** Every driving endpoint, rendered as text. Multiple drivers are kept. */
  drivers: string[];
}

export interface InstanceStructure {
  name: string;
  moduleName: string;
  resolved: boolean;
  ports: Array<{ port: string; direction: PortDirection; width: number; text: string }>;
}

export interface BusEdge {
  /** `<scope>:<baseName>[<msb>:<lsb>]`, or `<scope>:<name>` for scalars. */
  id: string;
  scope: string;
  baseName: string;
  /** Null for a scalar net. */
  lsb: number | null;
  msb: number | null;
  width: number;
  /** Constituent net names, ascending bit order. */
  nets: string[];
  /** Unconnected remainder of a vector whose other bits are connected. */
  partial: boolean;
  /** True when the bits touch at least one port or instance endpoint. */
  connected: boolean;
  /** Shared endpoint signature (`inst.port[offset]`), sorted. */
  pattern: string[];
  direction: NetDirection;
  /** Per-bit fallback produced by a grouping conflict. */
  conflict: boolean;
}

export interface ModuleStructure {
  moduleName: string;
  moduleIndex: number;
  ports: PortDecl[];
  nets: Net[];
  instances: InstanceStructure[];
  /** Empty until the bus aggregator has run. */
  busEdges: BusEdge[];
}

export interface StructuralModel {
  modules: ModuleStructure[];
}
