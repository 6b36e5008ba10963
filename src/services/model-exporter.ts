/**
 * model-exporter.ts
 * Writes build output to disk as deterministic files.
 *
 * Layout of the output directory:
 *   <levelId>.dot       one per hierarchy level
 *   index.json          navigation index
 *   diagnostics.json    merged diagnostics
 *   model.json          design, hierarchy, structure and behavior
 *   stats.json          counters
 *
 * JSON is stable: object keys sorted recursively, Maps written as objects,
 * 2-space indentation. Arrays keep their order.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { BuildArtifacts, BuildResult } from '../models/build-result.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Map);
}

export class ModelExporter {
  /** Same data → identical bytes. */
  static toJson(data: unknown): string {
    return JSON.stringify(data, ModelExporter._stableSortReplacer(), 2);
  }

  /** JSON projection of the models; the module table is written once, under `design`. */
  static modelView(result: BuildResult): Record<string, unknown> {
    const { moduleTable: _moduleTable, ...hierarchy } = result.hierarchy;
    return {
      design: result.design,
      hierarchy,
      structure: result.structure,
      behavior: result.behavior,
    };
  }

  /** Write every output file; returns the absolute paths written, in write order. */
  static writeOutputs(result: BuildResult, outDir: string): string[] {
    const resolved = path.resolve(outDir);
    fs.mkdirSync(resolved, { recursive: true });
    const written: string[] = [];

    const write = (name: string, text: string): void => {
      const file = path.join(resolved, name);
      fs.writeFileSync(file, text, 'utf-8');
      written.push(file);
    };

    for (const level of result.graph.levels) write(`${level.id}.dot`, level.dot);
    write('index.json', ModelExporter.toJson(result.graph.index));
    write('diagnostics.json', ModelExporter.toJson(result.diagnostics));
    write('model.json', ModelExporter.toJson(ModelExporter.modelView(result)));
    write('stats.json', ModelExporter.toJson(result.stats));
    return written;
  }

  /** Config plus intermediate IR, for `--debug` runs. */
  static writeDebugArtifacts(artifacts: BuildArtifacts, outDir: string): void {
    const resolved = path.resolve(outDir);
    fs.mkdirSync(resolved, { recursive: true });
    const write = (name: string, data: unknown): void => {
      fs.writeFileSync(path.join(resolved, name), ModelExporter.toJson(data), 'utf-8');
    };

    write('config.json', artifacts.config);
    write('ir.json', artifacts.result.design);
    write('hierarchy.json', artifacts.result.hierarchy.roots);
    write('structure.json', artifacts.result.structure);
    write('behavior.json', artifacts.result.behavior);
  }

  // ---------------------------------------------------------------------------
  // Stable sort replacer
  // ---------------------------------------------------------------------------

  private static _stableSortReplacer(): (key: string, value: unknown) => unknown {
    return (_key: string, value: unknown): unknown => {
      if (value instanceof Map) {
        const sorted: Record<string, unknown> = {};
        for (const k of [...value.keys()].map(String).sort()) sorted[k] = value.get(k);
        return sorted;
      }
      if (isPlainObject(value)) {
        const sorted: Record<string, unknown> = {};
        for (const k of Object.keys(value).sort()) sorted[k] = value[k];
        return sorted;
      }
      return value;
    };
  }
}
