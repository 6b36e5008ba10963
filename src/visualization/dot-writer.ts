/**
 * dot-writer.ts
 * Minimal line-oriented DOT builder. Every id and attribute value is quoted
 * and escaped; output order is call order.
 */

import type { DotAttrs } from '../models/style-config.js';

/** Escape for a double-quoted DOT string. Newlines become the `\n` escape. */
export function escapeDot(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\r?\n/g, '\\n');
}

export function formatAttrs(attrs: DotAttrs): string {
  const parts = Object.entries(attrs).map(([k, v]) => `${k}="${escapeDot(v)}"`);
  return parts.length === 0 ? '' : ` [${parts.join(', ')}]`;
}

export class DotWriter {
  private readonly _name: string;
  private readonly _lines: string[] = [];
  private _depth = 1;

  constructor(name: string) {
    this._name = name;
  }

  defaults(kind: 'graph' | 'node' | 'edge', attrs: DotAttrs): this {
    if (Object.keys(attrs).length > 0) this._push(`${kind}${formatAttrs(attrs)};`);
    return this;
  }

  /** Attributes of the current (sub)graph, one `key="value";` line each. */
  attrs(attrs: DotAttrs): this {
    for (const [k, v] of Object.entries(attrs)) this._push(`${k}="${escapeDot(v)}";`);
    return this;
  }

  node(id: string, attrs: DotAttrs = {}): this {
    this._push(`"${escapeDot(id)}"${formatAttrs(attrs)};`);
    return this;
  }

  edge(from: string, to: string, attrs: DotAttrs = {}): this {
    this._push(`"${escapeDot(from)}" -> "${escapeDot(to)}"${formatAttrs(attrs)};`);
    return this;
  }

  beginCluster(id: string): this {
    this._push(`subgraph "cluster_${escapeDot(id)}" {`);
    this._depth++;
    return this;
  }

  endCluster(): this {
    this._depth--;
    this._push('}');
    return this;
  }

  toString(): string {
    return `digraph "${escapeDot(this._name)}" {\n${this._lines.join('\n')}\n}\n`;
  }

  private _push(line: string): void {
    this._lines.push('  '.repeat(this._depth) + line);
  }
}
