/**
 * bus-aggregator.test.ts
 *
 * Tests for BusAggregator:
 *   1. data[3:0] with bits 0-1 connected → width-2 edge + width-2 partial edge
 *   2. Idempotence (edges derived from nets only)
 *   3. Runs split on gaps and on differing signatures; ordered by lsb
 *   4. Scalars form width-1 edges
 *   5. Grouping conflicts fall back to per-bit edges with a diagnostic
 *   6. Signature offsets and direction merging
 */

import { BusAggregator, bitSignature, mergeDirections } from '../bus-aggregator.js';
import type { BuildConfig } from '../../models/build-config.js';
import type { ModuleStructure, Net, NetDirection, NetEndpoint, StructuralModel } from '../../models/structure.js';
import { DiagnosticCollector } from '../../services/diagnostic-collector.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const cfg: BuildConfig = { projectRoot: '/design', inputFiles: [] };

function bit(
  declaration: string,
  index: number | null,
  endpoints: NetEndpoint[] = [],
  direction: NetDirection = 'internal',
): Net {
  const indexed = /^(.+)\[(\d+)\]$/.exec(declaration);
  const baseName = indexed?.[1] ?? declaration;
  const name = index === null || indexed !== null ? declaration : `${declaration}[${index}]`;
  return {
    key: `${declaration}#${index ?? 0}`,
    name,
    baseName,
    index,
    declaration,
    direction,
    directionConflict: false,
    endpoints,
    drivers: [],
  };
}

const toInst = (port: string, b: number | null): NetEndpoint => ({
  kind: 'instance',
  instance: 'u',
  port,
  bit: b,
  direction: 'in',
  resolved: true,
});

function model(...nets: Net[]): StructuralModel {
  const mod: ModuleStructure = {
    moduleName: 'top',
    moduleIndex: 0,
    ports: [],
    nets,
    instances: [],
    busEdges: [],
  };
  return { modules: [mod] };
}

function aggregate(m: StructuralModel) {
  const diagnostics = new DiagnosticCollector('aggregate');
  const out = new BusAggregator(cfg).aggregate(m, diagnostics);
  return { edges: out.modules[0]?.busEdges ?? [], out, diagnostics: diagnostics.toDiagnostics() };
}

// ---------------------------------------------------------------------------
// Runs
// ---------------------------------------------------------------------------

describe('BusAggregator runs', () => {
  it('splits a half-connected vector into a connected and a partial edge', () => {
    const { edges, diagnostics } = aggregate(
      model(bit('data', 0, [toInst('p', 0)], 'in'), bit('data', 1, [toInst('p', 1)], 'in'), bit('data', 2), bit('data', 3)),
    );
    expect(edges).toEqual([
      {
        id: 'top:data[1:0]',
        scope: 'top',
        baseName: 'data',
        lsb: 0,
        msb: 1,
        width: 2,
        nets: ['data[0]', 'data[1]'],
        partial: false,
        connected: true,
        pattern: ['u.p[0]'],
        direction: 'in',
        conflict: false,
      },
      {
        id: 'top:data[3:2]',
        scope: 'top',
        baseName: 'data',
        lsb: 2,
        msb: 3,
        width: 2,
        nets: ['data[2]', 'data[3]'],
        partial: true,
        connected: false,
        pattern: [],
        direction: 'internal',
        conflict: false,
      },
    ]);
    expect(diagnostics).toEqual([]);
  });

  it('is idempotent', () => {
    const first = aggregate(model(bit('data', 0, [toInst('p', 0)]), bit('data', 1), bit('en', null)));
    const second = aggregate(first.out);
    expect(second.edges).toEqual(first.edges);
  });

  it('never merges disjoint ranges and orders edges by starting index', () => {
    const { edges } = aggregate(model(bit('v', 5), bit('v', 4), bit('v', 1), bit('v', 0)));
    expect(edges.map((e) => [e.id, e.width, e.partial])).toEqual([
      ['top:v[1:0]', 2, false],
      ['top:v[5:4]', 2, false],
    ]);
  });

  it('splits contiguous bits whose signatures differ', () => {
    const { edges } = aggregate(model(bit('v', 0, [toInst('a', 0)]), bit('v', 1, [toInst('b', 0)])));
    expect(edges.map((e) => [e.id, e.pattern])).toEqual([
      ['top:v[0:0]', ['u.a[0]']],
      ['top:v[1:1]', ['u.b[-1]']],
    ]);
  });

  it('gives every scalar its own width-1 edge', () => {
    const { edges } = aggregate(model(bit('en', null), bit('clk', null, [toInst('c', null)])));
    expect(edges.map((e) => [e.id, e.lsb, e.msb, e.width, e.nets, e.connected])).toEqual([
      ['top:en', null, null, 1, ['en'], false],
      ['top:clk', null, null, 1, ['clk'], true],
    ]);
  });
});

// ---------------------------------------------------------------------------
// Conflicts
// ---------------------------------------------------------------------------

describe('BusAggregator conflicts', () => {
  it('falls back to per-bit edges when two declarations claim a bit', () => {
    const { edges, diagnostics } = aggregate(
      model(bit('data', 0), bit('data', 1), bit('data', 2), bit('data', 3), bit('data[2]', 2)),
    );
    expect(edges.map((e) => [e.id, e.conflict])).toEqual([
      ['top:data[1:0]', false],
      ['top:data[2:2]@data', true],
      ['top:data[2:2]@data[2]', true],
      ['top:data[3:3]', false],
    ]);
    expect(diagnostics).toEqual([
      {
        code: 'BusGroupingConflict',
        severity: 'error',
        stage: 'aggregate',
        modulePath: 'top',
        message: 'Bit data[2] is declared by "data" and "data[2]"',
        reference: 'data',
      },
    ]);
  });

  it('flags a `base[i]` declaration wider than one bit', () => {
    const wide = (index: number): Net => ({ ...bit('mem[1]', index), name: `mem[1][${index}]` });
    const { edges, diagnostics } = aggregate(model(wide(0), wide(1)));
    expect(edges.map((e) => e.id)).toEqual(['top:mem[0:0]@mem[1]', 'top:mem[1:1]@mem[1]']);
    expect(diagnostics.map((d) => d.message)).toEqual([
      'Declaration "mem[1]" is named like a bit of "mem" but is 2 bits wide',
    ]);
  });
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe('bus aggregation helpers', () => {
  it('signs endpoints with their offset from the net index', () => {
    const net = bit('v', 4, [
      toInst('p', 0),
      { kind: 'port', port: 'x', bit: null, direction: 'in' },
      { kind: 'block', block: 'always_0', role: 'driver' },
    ]);
    expect(bitSignature(net)).toEqual(['self.x[*]', 'u.p[-4]']);
  });

  it('merges directions monotonically', () => {
    expect(mergeDirections(['in', 'internal'])).toBe('in');
    expect(mergeDirections(['in', 'out'])).toBe('bidirectional');
    expect(mergeDirections(['bidirectional', 'in'])).toBe('bidirectional');
    expect(mergeDirections([])).toBe('internal');
  });
});
