#!/usr/bin/env node
/**
 * cli.ts
 * Command-line entry point for the AST-to-graph build.
 *
 * Output layout:
 *   <outputDir>/<levelId>.dot    : one digraph per hierarchy level
 *   <outputDir>/index.json       : navigation index
 *   <outputDir>/diagnostics.json : merged diagnostics
 *   <outputDir>/model.json       : normalized design + models
 *   <outputDir>/stats.json       : counters
 *   <outputDir>/debug/           : intermediate IR (--debug only)
 *
 * Usage:
 *   npx tsx src/cli.ts <projectRoot> <ast.xml|ast.json>... [--top NAME]... [--out DIR]
 *                      [--style FILE] [--no-fold] [--no-dfg] [--no-inter-block-dfg]
 *                      [--log-level LEVEL] [--debug]
 */

import * as path from 'node:path';
import type { BuildConfig } from './models/index.js';
import { BuildOrchestrator } from './orchestrator/index.js';
import { ConsoleLogger, TeeLogger, parseLogLevel } from './services/index.js';
import type { LogLevel } from './services/index.js';

function usage(): never {
  console.error('Usage: tsx src/cli.ts <projectRoot> <ast files>... [options]');
  console.error('');
  console.error('  projectRoot        — directory holding the AST files; reads never leave it');
  console.error('  ast files          — Verilator --xml-only output (.xml) or JSON trees (.json)');
  console.error('  --top NAME         — top module (repeatable); inferred when omitted');
  console.error('  --out DIR          — output directory, defaults to output/<project-name>');
  console.error('  --style FILE       — YAML style file, relative to projectRoot');
  console.error('  --no-fold          — keep constant right-hand sides unevaluated');
  console.error('  --no-dfg           — no data-flow edges between fragments');
  console.error('  --no-inter-block-dfg — data-flow edges only inside a block');
  console.error('  --log-level LEVEL  — debug | info | warn | error | silent (default info)');
  console.error('  --debug            — debug logs, intermediate IR and a log file under logs/');
  process.exit(1);
}

const rawArgs = process.argv.slice(2);
const positional: string[] = [];
const tops: string[] = [];
let rawOutputDir: string | undefined;
let styleFile: string | undefined;
let logLevel: LogLevel = 'info';
let verbose = false;
let foldConstants = true;
let dataFlow = true;
let interBlockDataFlow = true;

for (let i = 0; i < rawArgs.length; i++) {
  const arg = rawArgs[i];
  if (arg === undefined) break;
  const takeValue = (): string => {
    const value = rawArgs[++i];
    if (value === undefined || value.startsWith('--')) {
      console.error(`Missing value for ${arg}`);
      usage();
    }
    return value;
  };

  switch (arg) {
    case '--top':
      tops.push(takeValue());
      break;
    case '--out':
      rawOutputDir = takeValue();
      break;
    case '--style':
      styleFile = takeValue();
      break;
    case '--no-fold':
      foldConstants = false;
      break;
    case '--no-dfg':
      dataFlow = false;
      break;
    case '--no-inter-block-dfg':
      interBlockDataFlow = false;
      break;
    case '--log-level': {
      const level = parseLogLevel(takeValue());
      if (level === null) usage();
      logLevel = level;
      break;
    }
    case '--debug':
      verbose = true;
      break;
    default:
      if (arg.startsWith('--')) {
        console.error(`Unknown option ${arg}`);
        usage();
      }
      positional.push(arg);
  }
}

const [projectRoot, ...inputFiles] = positional;
if (projectRoot === undefined || inputFiles.length === 0) usage();

const resolvedProjectRoot = path.resolve(projectRoot);
const designName = path.basename(resolvedProjectRoot);
const outputDir = path.resolve(rawOutputDir ?? path.join('output', designName));

const cfg: BuildConfig = {
  projectRoot: resolvedProjectRoot,
  inputFiles,
  foldConstants,
  dataFlow,
  interBlockDataFlow,
  ...(tops.length > 0 && { topModules: tops }),
  ...(styleFile !== undefined && { styleFile }),
};

console.log('hdlgraph build starting…');
console.log(`  projectRoot : ${cfg.projectRoot}`);
console.log(`  inputs      : ${inputFiles.join(', ')}`);
console.log(`  tops        : ${tops.length > 0 ? tops.join(', ') : '(inferred)'}`);
console.log(`  outputDir   : ${outputDir}`);
if (verbose) {
  console.log('  debug       : on');
}

const t0 = Date.now();
const logger = verbose ? new TeeLogger('debug') : new ConsoleLogger(logLevel);

try {
  const result = new BuildOrchestrator(cfg, {
    outputDir,
    logger,
    ...(verbose && { debugOutputDir: path.join(outputDir, 'debug') }),
  }).run();
  const elapsed = Date.now() - t0;

  const { stats } = result;
  console.log('');
  console.log('Build complete ✓');
  console.log(`  modules    : ${stats.moduleCount} (${stats.rejectedModuleCount} rejected)`);
  console.log(`  instances  : ${stats.instanceCount}`);
  console.log(`  nets       : ${stats.netCount}`);
  console.log(`  bus edges  : ${stats.busEdgeCount}`);
  console.log(`  blocks     : ${stats.blockCount} (${stats.fragmentCount} fragments)`);
  console.log(`  data flow  : ${stats.dataFlowEdgeCount} edges`);
  console.log(`  levels     : ${stats.levelCount}`);
  console.log(`  diagnostics: ${stats.fatalCount} fatal, ${stats.errorCount} error, ${stats.warningCount} warning`);
  console.log(`  elapsed    : ${elapsed} ms`);
  console.log(`  output     : ${outputDir}`);

  for (const d of result.diagnostics) {
    console.log(`  [${d.severity}] ${d.code} ${d.modulePath}: ${d.message}`);
  }

  // Write log file when --debug is used
  if (logger instanceof TeeLogger) {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    const logPath = path.join('logs', designName, timestamp, 'build.log');
    logger.flush(path.resolve(logPath));
    console.log(`  log        : ${logPath}`);
  }

  process.exit(0);
} catch (err) {
  const elapsed = Date.now() - t0;
  console.error('');
  console.error(`Build FAILED after ${elapsed} ms`);
  console.error(err instanceof Error ? err.message : String(err));
  if (verbose && err instanceof Error && err.stack) {
    console.error(err.stack);
  }
  process.exit(1);
}
