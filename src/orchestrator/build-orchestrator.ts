/**
 * build-orchestrator.ts
 * Single entry-point for a complete AST-to-graph build.
 *
 * Pipeline order:
 *   0. Read AST documents (XML or JSON) and the optional style file
 *   1. AstNormalizer.normalize(documents)           → NormalizedDesign
 *   2. HierarchyResolver.resolve(design)            → HierarchyModel
 *   3. StructuralModelBuilder.build(hierarchy)      → StructuralModel (nets)
 *   4. BusAggregator.aggregate(structure)           → StructuralModel (bus edges)
 *   5. BehavioralExtractor.extract(hierarchy, ...)  → BehavioralModel
 *   6. GraphEmitter.emit(...)                       → GraphDescription
 *   7. Merge diagnostics, compute stats
 *   8. ModelValidator.validate(result)
 *   9. Optional disk output
 *
 * Every stage gets its own DiagnosticCollector; they are merged once, in
 * pipeline order. Only a fatal condition on the single requested top module
 * escapes as a thrown error.
 */

import type { AstNode } from '../models/ast.js';
import type { Fragment } from '../models/behavior.js';
import type { BuildConfig } from '../models/build-config.js';
import type { BuildResult, BuildStats } from '../models/build-result.js';
import type { Diagnostic } from '../models/diagnostics.js';
import type { InstanceNode } from '../models/hierarchy.js';
import type { StyleConfig } from '../models/style-config.js';
import { readAstDocument } from '../parsers/xml/verilator-xml-reader.js';
import { AstNormalizer } from '../builders/ast-normalizer.js';
import { HierarchyResolver } from '../builders/hierarchy-resolver.js';
import { StructuralModelBuilder } from '../builders/structural-model-builder.js';
import { BusAggregator } from '../builders/bus-aggregator.js';
import { BehavioralExtractor } from '../builders/behavioral-extractor.js';
import { GraphEmitter } from '../visualization/graph-emitter.js';
import { DiagnosticCollector, mergeDiagnostics } from '../services/diagnostic-collector.js';
import { ConfigError, MalformedAstError } from '../services/errors.js';
import { FileService } from '../services/file-service.js';
import { ModelExporter } from '../services/model-exporter.js';
import { ModelValidator } from '../services/model-validator.js';
import { loadStyleConfig } from '../services/style-config-loader.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

/** One input document, already read from disk. */
export interface AstDocument {
  sourceName: string;
  text: string;
}

export interface BuildOrchestratorOptions {
  /** Directory for DOT files and JSON artifacts. Nothing is written when absent. */
  outputDir?: string;
  debugOutputDir?: string;
  skipValidation?: boolean;
  logger?: Logger;
  /** Overrides `cfg.styleFile`. */
  style?: StyleConfig;
}

export function countFragments(fragments: readonly Fragment[]): number {
  let n = 0;
  for (const f of fragments) {
    n++;
    if (f.kind === 'conditional' || f.kind === 'case') {
      for (const br of f.branches) n += countFragments(br.fragments);
    } else if (f.kind === 'loop') {
      n += countFragments(f.body);
    }
  }
  return n;
}

function countInstances(nodes: readonly InstanceNode[]): number {
  return nodes.reduce((sum, n) => sum + n.children.length + countInstances(n.children), 0);
}

export class BuildOrchestrator {
  private readonly _cfg: BuildConfig;
  private readonly _options: BuildOrchestratorOptions;
  private readonly _log: Logger;

  constructor(cfg: BuildConfig, options: BuildOrchestratorOptions = {}) {
    this._cfg = cfg;
    this._options = options;
    this._log = options.logger ?? new SilentLogger();
  }

  /** Read `cfg.inputFiles` (and the style file) through the sandbox, then build. */
  run(): BuildResult {
    const files = new FileService(this._cfg.projectRoot);
    const documents: AstDocument[] = this._cfg.inputFiles.map((file) => {
      const text = files.readText(file);
      if (text === null) {
        throw new ConfigError(`Input file not found or outside the project root: ${file}`);
      }
      return { sourceName: file, text };
    });

    let style = this._options.style;
    if (style === undefined && this._cfg.styleFile !== undefined) {
      const text = files.readText(this._cfg.styleFile);
      if (text === null) {
        throw new ConfigError(`Style file not found or outside the project root: ${this._cfg.styleFile}`);
      }
      style = loadStyleConfig(text, this._cfg.styleFile);
      this._log.info('Style configuration loaded', { path: this._cfg.styleFile });
    }

    return this.build(documents, style);
  }

  /** Pure core: documents in, models out. Writes only when an output dir is set. */
  build(documents: readonly AstDocument[], style: StyleConfig | undefined = this._options.style): BuildResult {
    this._log.info('Build pipeline starting', { documents: documents.length });

    // Step 0: Read
    const readDiag = new DiagnosticCollector('read');
    const roots: Array<{ root: AstNode; sourceName: string }> = [];
    for (const doc of documents) {
      try {
        roots.push({ root: readAstDocument(doc.text, doc.sourceName), sourceName: doc.sourceName });
      } catch (err) {
        if (!(err instanceof MalformedAstError)) throw err;
        readDiag.add(err);
        this._log.warn('Document rejected', { sourceName: doc.sourceName, reason: err.message });
      }
    }

    // Step 1: Normalize
    this._log.info('Step 1/6  Normalizing AST');
    const normalizeDiag = new DiagnosticCollector('normalize');
    const design = new AstNormalizer(this._cfg, this._log).normalize(roots, normalizeDiag);
    this._log.info('Step 1/6  Done', { modules: design.modules.length, rejected: design.rejected.length });

    // Step 2: Resolve hierarchy
    this._log.info('Step 2/6  Resolving hierarchy', { tops: this._cfg.topModules ?? [] });
    const resolveDiag = new DiagnosticCollector('resolve');
    const hierarchy = new HierarchyResolver(this._cfg, this._log).resolve(design, resolveDiag);
    this._log.info('Step 2/6  Done', {
      roots: hierarchy.roots.map((r) => r.path),
      unresolved: hierarchy.unresolved.length,
      cycles: hierarchy.cycles.length,
    });

    // Step 3: Nets
    this._log.info('Step 3/6  Building structural model');
    const structureDiag = new DiagnosticCollector('structure');
    const nets = new StructuralModelBuilder(this._cfg, this._log).build(hierarchy, structureDiag);
    this._log.info('Step 3/6  Done', { modules: nets.modules.length });

    // Step 4: Bus edges
    this._log.info('Step 4/6  Aggregating buses');
    const aggregateDiag = new DiagnosticCollector('aggregate');
    const structure = new BusAggregator(this._cfg, this._log).aggregate(nets, aggregateDiag);
    this._log.info('Step 4/6  Done', {
      busEdges: structure.modules.reduce((s, m) => s + m.busEdges.length, 0),
    });

    // Step 5: Behavior
    this._log.info('Step 5/6  Extracting behavior');
    const extractDiag = new DiagnosticCollector('extract');
    const behavior = new BehavioralExtractor(this._cfg, this._log).extract(hierarchy, structure, extractDiag);
    this._log.info('Step 5/6  Done', {
      blocks: behavior.modules.reduce((s, m) => s + m.blocks.length, 0),
    });

    // Step 6: Graph
    this._log.info('Step 6/6  Emitting graph');
    const emitDiag = new DiagnosticCollector('emit');
    const graph = new GraphEmitter(this._cfg, style, this._log).emit(hierarchy, structure, behavior);
    this._log.info('Step 6/6  Done', { levels: graph.levels.length });

    const diagnostics = mergeDiagnostics([
      readDiag,
      normalizeDiag,
      resolveDiag,
      structureDiag,
      aggregateDiag,
      extractDiag,
      emitDiag,
    ]);

    const result: BuildResult = {
      design,
      hierarchy,
      structure,
      behavior,
      graph,
      diagnostics,
      stats: {
        moduleCount: design.modules.length,
        rejectedModuleCount: design.rejected.length,
        instanceCount: countInstances(hierarchy.roots),
        netCount: structure.modules.reduce((s, m) => s + m.nets.length, 0),
        busEdgeCount: structure.modules.reduce((s, m) => s + m.busEdges.length, 0),
        blockCount: behavior.modules.reduce((s, m) => s + m.blocks.length, 0),
        fragmentCount: behavior.modules.reduce(
          (s, m) => s + m.blocks.reduce((t, b) => t + countFragments(b.fragments), 0),
          0,
        ),
        dataFlowEdgeCount: behavior.modules.reduce((s, m) => s + m.dataFlow.length, 0),
        levelCount: graph.levels.length,
        ...severityCounts(diagnostics),
      },
    };

    // Diagnostic audit
    for (const d of diagnostics) {
      this._log.debug('  diagnostic', { code: d.code, stage: d.stage, modulePath: d.modulePath });
    }

    // Validate
    if (this._options.skipValidation !== true) {
      this._log.info('Validating model invariants');
      ModelValidator.validate(result);
      this._log.info('Validation passed');
    }

    // Disk output
    if (this._options.outputDir !== undefined) {
      this._log.info('Writing outputs', { dir: this._options.outputDir });
      const written = ModelExporter.writeOutputs(result, this._options.outputDir);
      this._log.info('Outputs written', { files: written.length });
    }
    if (this._options.debugOutputDir !== undefined) {
      this._log.info('Writing debug artifacts', { dir: this._options.debugOutputDir });
      ModelExporter.writeDebugArtifacts({ config: this._cfg, result }, this._options.debugOutputDir);
      this._log.info('Debug artifacts written');
    }

    this._log.info('Build pipeline complete', { ...result.stats });
    return result;
  }
}

function severityCounts(
  diagnostics: readonly Diagnostic[],
): Pick<BuildStats, 'fatalCount' | 'errorCount' | 'warningCount'> {
  return {
    fatalCount: diagnostics.filter((d) => d.severity === 'fatal').length,
    errorCount: diagnostics.filter((d) => d.severity === 'error').length,
    warningCount: diagnostics.filter((d) => d.severity === 'warning').length,
  };
}
