/**
 * verilator-xml-reader.ts
 * Reads Verilator `--xml-only` output (or a JSON dump of the same tree) into
 * the generic AstNode tree.
 *
 * fast-xml-parser runs in `preserveOrder` mode so that siblings keep document
 * order; the default object mode groups same-named siblings and would lose
 * the interleaving of declarations and statements.
 *
 * preserveOrder shape:
 *   [ { "<tag>": [ ...children ], ":@": { "@_attr": "value" } }, { "#text": "..." } ]
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { AstNode } from '../../models/ast.js';
import { MalformedAstError } from '../../services/errors.js';

const ATTR_PREFIX = '@_';
const ATTR_KEY = ':@';
const TEXT_KEY = '#text';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readAttrs(raw: unknown): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (!isRecord(raw)) return attrs;
  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTR_PREFIX) ? key.slice(ATTR_PREFIX.length) : key;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      attrs[name] = String(value);
    }
  }
  return attrs;
}

function toAstNodes(items: unknown): AstNode[] {
  if (!Array.isArray(items)) return [];
  const nodes: AstNode[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    const attrs = readAttrs(item[ATTR_KEY]);
    for (const [key, value] of Object.entries(item)) {
      if (key === ATTR_KEY || key === TEXT_KEY) continue;
      nodes.push({ tag: key, attrs, children: toAstNodes(value) });
    }
  }
  return nodes;
}

/**
 * Parse one Verilator XML document.
 * Returns the document element (normally `<verilator_xml>`).
 * Throws MalformedAstError when the text is not well-formed XML or is empty.
 */
export function readVerilatorXml(text: string, sourceName = '<xml>'): AstNode {
  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new MalformedAstError(sourceName, `Invalid XML: ${msg} (line ${line})`);
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    preserveOrder: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseAttributeValue: false,
    parseTagValue: false,
    trimValues: true,
  });

  const roots = toAstNodes(parser.parse(text));
  const root = roots[0];
  if (root === undefined) {
    throw new MalformedAstError(sourceName, 'XML document has no root element');
  }
  return root;
}

// ---------------------------------------------------------------------------
// JSON input
// ---------------------------------------------------------------------------

function toAstNodeFromJson(value: unknown, where: string, sourceName: string): AstNode {
  if (!isRecord(value)) {
    throw new MalformedAstError(sourceName, `Expected an AST node object at ${where}`);
  }
  const tag = value['tag'];
  if (typeof tag !== 'string' || tag === '') {
    throw new MalformedAstError(sourceName, `Expected an AST node with a "tag" at ${where}`);
  }
  const rawChildren = value['children'] ?? [];
  if (!Array.isArray(rawChildren)) {
    throw new MalformedAstError(sourceName, `"children" must be an array at ${where}`);
  }
  return {
    tag,
    attrs: readAttrs(value['attrs']),
    children: rawChildren.map((c, i) => toAstNodeFromJson(c, `${where}.children[${i}]`, sourceName)),
  };
}

/**
 * Parse a JSON document holding one AstNode tree
 * (`{ "tag": ..., "attrs": {...}, "children": [...] }`).
 */
export function readJsonAst(text: string, sourceName = '<json>'): AstNode {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedAstError(sourceName, `Invalid JSON: ${reason}`);
  }
  return toAstNodeFromJson(parsed, '$', sourceName);
}

/** Pick the reader by file extension (`.json` → JSON, anything else → XML). */
export function readAstDocument(text: string, fileName: string): AstNode {
  return fileName.toLowerCase().endsWith('.json')
    ? readJsonAst(text, fileName)
    : readVerilatorXml(text, fileName);
}
