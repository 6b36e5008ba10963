/**
 * style-config-loader.test.ts
 *
 * Tests for loadStyleConfig / parseStyleConfig: defaults, merging,
 * value coercion and rejection of malformed files.
 */

import { DEFAULT_STYLE } from '../../models/style-config.js';
import { ConfigError } from '../errors.js';
import { loadStyleConfig, parseStyleConfig } from '../style-config-loader.js';

describe('loadStyleConfig', () => {
  it('returns the defaults for an empty document', () => {
    expect(loadStyleConfig('')).toEqual(DEFAULT_STYLE);
  });

  it('merges attributes over the defaults and stringifies scalars', () => {
    const style = loadStyleConfig(
      [
        'graph:',
        '  rankdir: TB',
        '  nodesep: 0.5',
        'blocks:',
        '  "FSM Controller":',
        '    color: red',
        'fragments:',
        '  opaque:',
        '    fixedsize: true',
        'linkTemplate: "{id}.html"',
        'bus:',
        '  maxPenWidth: 8',
      ].join('\n'),
    );

    expect(style.graph).toEqual({ rankdir: 'TB', fontname: 'Arial', fontsize: '12', compound: 'true', nodesep: '0.5' });
    expect(style.blocks['FSM Controller']).toEqual({ color: 'red', style: 'filled,rounded', fillcolor: '#eaf6fd' });
    expect(style.fragments.opaque).toEqual({
      shape: 'note',
      fillcolor: '#e0e0e0',
      fontcolor: '#444444',
      fixedsize: 'true',
    });
    expect(style.linkTemplate).toBe('{id}.html');
    expect(style.bus).toEqual({ basePenWidth: 1, maxPenWidth: 8 });
  });

  it('merges data-flow edge attributes', () => {
    const style = loadStyleConfig('dataFlow:\n  color: red\n  constraint: true\n');
    expect(style.dataFlow).toEqual({ style: 'dashed', color: 'red', fontcolor: '#1f77b4', constraint: 'true' });
    expect(DEFAULT_STYLE.dataFlow['color']).toBe('#1f77b4');
  });

  it('never mutates the defaults', () => {
    loadStyleConfig('node:\n  fontname: Courier\nblocks:\n  Counter:\n    color: black\n');
    expect(DEFAULT_STYLE.node['fontname']).toBe('Arial');
    expect(DEFAULT_STYLE.blocks.Counter['color']).toBe('lightgreen');
  });

  it('prefixes YAML syntax errors with the source name', () => {
    expect(() => loadStyleConfig('graph: [unclosed', 'style.yaml')).toThrow(/^style\.yaml: invalid YAML: /);
  });
});

describe('parseStyleConfig errors', () => {
  const cases: Array<[string, unknown, string]> = [
    ['non-mapping document', ['a'], 'cfg: top level must be a mapping'],
    ['unknown top-level key', { colours: {} }, 'cfg: unknown key "colours"'],
    ['non-mapping data flow', { dataFlow: 'dashed' }, 'cfg: dataFlow must be a mapping'],
    ['unknown classification', { blocks: { Widget: {} } }, 'cfg: unknown block classification "Widget"'],
    ['unknown fragment kind', { fragments: { call: {} } }, 'cfg: unknown fragment kind "call"'],
    ['nested value', { node: { font: { name: 'x' } } }, 'cfg: node.font must be a string, number or boolean'],
    ['link without id', { linkTemplate: '{path}.svg' }, 'cfg: linkTemplate must be a string containing "{id}"'],
    ['unknown bus key', { bus: { minPenWidth: 1 } }, 'cfg: unknown key "bus.minPenWidth"'],
    ['non-positive pen width', { bus: { basePenWidth: 0 } }, 'cfg: bus.basePenWidth must be a positive number'],
    [
      'inverted pen widths',
      { bus: { basePenWidth: 4, maxPenWidth: 2 } },
      'cfg: bus.maxPenWidth must not be smaller than bus.basePenWidth',
    ],
  ];

  it.each(cases)('rejects %s', (_name, raw, message) => {
    expect(() => parseStyleConfig(raw, 'cfg')).toThrow(new ConfigError(message));
  });
});
