/**
 * verilator-xml-reader.test.ts
 *
 * Tests for the AST readers:
 *   1. Sibling order preserved across different tags
 *   2. Attributes without prefix, text content dropped
 *   3. Malformed XML / JSON → MalformedAstError
 *   4. Dispatch by file extension
 */

import { readAstDocument, readJsonAst, readVerilatorXml } from '../verilator-xml-reader.js';
import { MalformedAstError } from '../../../services/errors.js';

const XML = `<?xml version="1.0" ?>
<verilator_xml>
  <netlist>
    <module name="top" topModule="1">
      <var name="a" dir="input"/>
      <always/>
      <var name="b"/>
      <text>ignored</text>
    </module>
  </netlist>
</verilator_xml>`;

describe('readVerilatorXml', () => {
  it('returns the document element', () => {
    const root = readVerilatorXml(XML);
    expect(root.tag).toBe('verilator_xml');
    expect(root.children.map((c) => c.tag)).toEqual(['netlist']);
  });

  it('keeps interleaved siblings in document order', () => {
    const mod = readVerilatorXml(XML).children[0]?.children[0];
    expect(mod?.tag).toBe('module');
    expect(mod?.children.map((c) => c.tag)).toEqual(['var', 'always', 'var', 'text']);
  });

  it('strips the attribute prefix and keeps values as strings', () => {
    const mod = readVerilatorXml(XML).children[0]?.children[0];
    expect(mod?.attrs).toEqual({ name: 'top', topModule: '1' });
    expect(mod?.children[0]?.attrs).toEqual({ name: 'a', dir: 'input' });
  });

  it('drops text content', () => {
    const mod = readVerilatorXml(XML).children[0]?.children[0];
    expect(mod?.children[3]?.children).toEqual([]);
  });

  it('rejects text that is not well-formed', () => {
    expect(() => readVerilatorXml('<module name="x">', 'bad.xml')).toThrow(MalformedAstError);
  });

  it('names the source in the error', () => {
    try {
      readVerilatorXml('<a><b></a>', 'bad.xml');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedAstError);
      if (err instanceof MalformedAstError) expect(err.modulePath).toBe('bad.xml');
    }
  });
});

describe('readJsonAst', () => {
  it('accepts the AstNode shape', () => {
    const root = readJsonAst(
      JSON.stringify({ tag: 'module', attrs: { name: 'm', width: 4 }, children: [{ tag: 'var' }] }),
    );
    expect(root).toEqual({
      tag: 'module',
      attrs: { name: 'm', width: '4' },
      children: [{ tag: 'var', attrs: {}, children: [] }],
    });
  });

  it('rejects invalid JSON', () => {
    expect(() => readJsonAst('{', 'x.json')).toThrow(MalformedAstError);
  });

  it('rejects a node without a tag', () => {
    expect(() => readJsonAst(JSON.stringify({ children: [] }))).toThrow(/"tag"/);
  });

  it('rejects non-array children', () => {
    expect(() => readJsonAst(JSON.stringify({ tag: 'm', children: {} }))).toThrow(/children/);
  });
});

describe('readAstDocument', () => {
  it('dispatches on the file extension', () => {
    expect(readAstDocument('{"tag":"netlist"}', 'design.JSON').tag).toBe('netlist');
    expect(readAstDocument('<netlist/>', 'design.xml').tag).toBe('netlist');
  });
});
