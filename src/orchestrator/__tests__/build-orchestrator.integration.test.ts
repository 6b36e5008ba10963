/**
 * build-orchestrator.integration.test.ts
 *
 * Integration tests for BuildOrchestrator using the in-repo fixtures at
 * tests/fixtures/counter/.
 *
 * Fixture structure:
 *   counter.xml  : top (clk, rst, count[3:0]) instantiating counter as u_cnt;
 *                  counter has one `always @(posedge clk)` with
 *                  `if (rst) q <= 4'h0; else q <= q + STEP;`
 *   cycle.json   : A instantiates B, B instantiates A and a missing "ghost"
 *   hdlgraph.yaml: style overrides (rankdir, Counter color, link template)
 *
 * These tests verify:
 *   1. Stats and diagnostics of a clean build
 *   2. Output files written to disk, byte-identical across runs
 *   3. Style file applied through cfg.styleFile
 *   4. Cycles and unresolved modules reported without aborting
 *   5. Unreadable documents collected as read-stage diagnostics
 *   6. Missing inputs and style files rejected with ConfigError
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { BuildOrchestrator, ConfigError, levelId } from '../../index.js';
import type { BuildConfig, BuildResult } from '../../index.js';

// ---------------------------------------------------------------------------
// Fixture paths
// ---------------------------------------------------------------------------

const FIXTURE_ROOT = path.resolve('tests/fixtures/counter');

function makeConfig(over: Partial<BuildConfig> = {}): BuildConfig {
  return { projectRoot: FIXTURE_ROOT, inputFiles: ['counter.xml'], ...over };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hdlgraph-int-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function readDir(dir: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const name of fs.readdirSync(dir).sort()) out[name] = fs.readFileSync(path.join(dir, name), 'utf-8');
  return out;
}

function levelDot(result: BuildResult, p: string): string[] {
  return (result.graph.levels.find((l) => l.path === p)?.dot ?? '').split('\n');
}

// ---------------------------------------------------------------------------
// Counter design
// ---------------------------------------------------------------------------

describe('BuildOrchestrator — counter fixture', () => {
  it('builds the full model without diagnostics', () => {
    const result = new BuildOrchestrator(makeConfig()).run();

    expect(result.diagnostics).toEqual([]);
    expect(result.stats).toEqual({
      moduleCount: 2,
      rejectedModuleCount: 0,
      instanceCount: 1,
      netCount: 12,
      busEdgeCount: 6,
      blockCount: 1,
      fragmentCount: 3,
      dataFlowEdgeCount: 0,
      levelCount: 2,
      fatalCount: 0,
      errorCount: 0,
      warningCount: 0,
    });
    expect(result.hierarchy.roots.map((r) => r.path)).toEqual(['top']);
  });

  it('groups the counter output into one 4-bit edge', () => {
    const result = new BuildOrchestrator(makeConfig()).run();
    const top = result.structure.modules.find((m) => m.moduleName === 'top');

    expect(top?.busEdges.map((e) => [e.id, e.width, e.direction, e.pattern])).toEqual([
      ['top:clk', 1, 'in', ['self.clk[*]', 'u_cnt.clk[*]']],
      ['top:rst', 1, 'in', ['self.rst[*]', 'u_cnt.rst[*]']],
      ['top:count[3:0]', 4, 'out', ['self.count[0]', 'u_cnt.q[0]']],
    ]);
  });

  it('classifies the register update as a counter', () => {
    const result = new BuildOrchestrator(makeConfig()).run();
    const block = result.behavior.modules.find((m) => m.moduleName === 'counter')?.blocks[0];

    expect(block).toMatchObject({ id: 'always_0', trigger: 'posedge clk', sequential: true, classification: 'Counter' });
    const [cond] = block?.fragments ?? [];
    if (cond?.kind !== 'conditional') throw new Error('expected conditional');
    expect(cond.origin).toEqual({ file: 'rtl/counter.v', startLine: 8, startCol: 5, endLine: 8, endCol: 7 });
    expect(cond.branches.flatMap((b) => b.fragments.map((f) => f.label))).toEqual(["q <= 4'h0", 'q <= (q + STEP)']);
  });

  it('writes level graphs and JSON artifacts, identical across runs', () => {
    const first = path.join(tmpDir, 'first');
    const second = path.join(tmpDir, 'second');
    new BuildOrchestrator(makeConfig(), { outputDir: first }).run();
    new BuildOrchestrator(makeConfig(), { outputDir: second }).run();

    const files = readDir(first);
    expect(Object.keys(files)).toEqual(
      [
        `${levelId('top')}.dot`,
        `${levelId('top.u_cnt')}.dot`,
        'diagnostics.json',
        'index.json',
        'model.json',
        'stats.json',
      ].sort(),
    );
    expect(readDir(second)).toEqual(files);
    expect(files['diagnostics.json']).toBe('[]');

    const stats: unknown = JSON.parse(files['stats.json'] ?? '{}');
    expect(stats).toMatchObject({ levelCount: 2, busEdgeCount: 6 });
  });

  it('writes debug artifacts when asked', () => {
    new BuildOrchestrator(makeConfig(), { debugOutputDir: tmpDir }).run();
    expect(fs.readdirSync(tmpDir).sort()).toEqual([
      'behavior.json',
      'config.json',
      'hierarchy.json',
      'ir.json',
      'structure.json',
    ]);
  });

  it('applies the style file named in the config', () => {
    const result = new BuildOrchestrator(makeConfig({ styleFile: 'hdlgraph.yaml' })).run();
    const top = levelDot(result, 'top');
    const counter = levelDot(result, 'top.u_cnt');

    expect(top[1]).toBe(
      '  graph [rankdir="TB", fontname="Arial", fontsize="12", compound="true", label="top (top)", labelloc="t"];',
    );
    expect(top.some((l) => l.includes(`URL="${levelId('top.u_cnt')}.html"`))).toBe(true);
    expect(counter).toContain('    color="darkgreen";');
  });
});

// ---------------------------------------------------------------------------
// Recoverable errors
// ---------------------------------------------------------------------------

describe('BuildOrchestrator — recoverable errors', () => {
  it('truncates cycles and keeps unresolved instances', () => {
    const result = new BuildOrchestrator(makeConfig({ inputFiles: ['cycle.json'] })).run();

    expect(result.diagnostics.map((d) => [d.stage, d.code])).toEqual([
      ['resolve', 'UnresolvedReference'],
      ['resolve', 'HierarchyCycle'],
    ]);
    expect(result.graph.index.entries.map((e) => [e.path, e.file !== null, e.linkTarget])).toEqual([
      ['A', true, levelId('A')],
      ['A.b', true, levelId('A.b')],
      ['A.b.a', false, levelId('A')],
      ['A.b.g', false, null],
    ]);
    expect(result.stats).toMatchObject({ instanceCount: 3, levelCount: 2, errorCount: 2 });
  });

  it('collects unreadable documents and builds the rest', () => {
    const result = new BuildOrchestrator(makeConfig()).build([
      { sourceName: 'broken.xml', text: '<verilator_xml><netlist>' },
      { sourceName: 'counter.xml', text: fs.readFileSync(path.join(FIXTURE_ROOT, 'counter.xml'), 'utf-8') },
    ]);

    expect(result.diagnostics.map((d) => [d.stage, d.code, d.severity, d.modulePath])).toEqual([
      ['read', 'MalformedAst', 'fatal', 'broken.xml'],
    ]);
    expect(result.stats.moduleCount).toBe(2);
    expect(result.stats.fatalCount).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Configuration errors
// ---------------------------------------------------------------------------

describe('BuildOrchestrator — configuration errors', () => {
  it('rejects missing inputs and inputs outside the project root', () => {
    expect(() => new BuildOrchestrator(makeConfig({ inputFiles: ['nope.xml'] })).run()).toThrow(
      new ConfigError('Input file not found or outside the project root: nope.xml'),
    );
    expect(() => new BuildOrchestrator(makeConfig({ inputFiles: ['../cycle.json'] })).run()).toThrow(ConfigError);
  });

  it('rejects a missing style file', () => {
    expect(() => new BuildOrchestrator(makeConfig({ styleFile: 'missing.yaml' })).run()).toThrow(
      new ConfigError('Style file not found or outside the project root: missing.yaml'),
    );
  });
});
