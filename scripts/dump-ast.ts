#!/usr/bin/env tsx
/**
 * Quick diagnostic: prints the AstNode tree and the normalized IR of one
 * AST file, to check what the reader and normalizer make of it.
 *
 *   npx tsx scripts/dump-ast.ts <file.xml|file.json> [--ir]
 */
import { readFileSync } from 'node:fs';
import { AstNormalizer } from '../src/builders/ast-normalizer.js';
import type { AstNode } from '../src/models/ast.js';
import { readAstDocument } from '../src/parsers/xml/verilator-xml-reader.js';
import { DiagnosticCollector } from '../src/services/diagnostic-collector.js';
import { ModelExporter } from '../src/services/model-exporter.js';

const [file, flag] = process.argv.slice(2);
if (file === undefined) {
  console.error('Usage: tsx scripts/dump-ast.ts <file.xml|file.json> [--ir]');
  process.exit(1);
}

const root = readAstDocument(readFileSync(file, 'utf-8'), file);

function countNodes(node: AstNode): number {
  return 1 + node.children.reduce((s, c) => s + countNodes(c), 0);
}

console.log('AST node count:', countNodes(root));

if (flag === '--ir') {
  const diagnostics = new DiagnosticCollector('normalize');
  const design = new AstNormalizer({ projectRoot: '.', inputFiles: [file] }).normalize(
    [{ root, sourceName: file }],
    diagnostics,
  );
  console.log(ModelExporter.toJson(design));
  for (const d of diagnostics.toDiagnostics()) console.log(`[${d.severity}] ${d.code}: ${d.message}`);
} else {
  console.log(ModelExporter.toJson(root));
}
