/**
 * file-service.test.ts
 *
 * FileService must never read outside projectRoot and returns null rather
 * than throwing for files it cannot read.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileService } from '../file-service.js';

describe('FileService', () => {
  let root: string;
  let outside: string;

  beforeEach(() => {
    const base = fs.mkdtempSync(path.join(os.tmpdir(), 'hdlgraph-fs-'));
    root = path.join(base, 'project');
    outside = path.join(base, 'secret.xml');
    fs.mkdirSync(path.join(root, 'ast'), { recursive: true });
    fs.writeFileSync(path.join(root, 'ast', 'b.xml'), '<verilator_xml/>');
    fs.writeFileSync(path.join(root, 'ast', 'a.json'), '{}');
    fs.writeFileSync(outside, '<verilator_xml/>');
  });

  afterEach(() => {
    fs.rmSync(path.dirname(root), { recursive: true, force: true });
  });

  it('reads files relative to the root or by absolute path', () => {
    const files = new FileService(root);
    expect(files.readText('ast/b.xml')).toBe('<verilator_xml/>');
    expect(files.readText(path.join(root, 'ast', 'a.json'))).toBe('{}');
  });

  it('returns null for a missing file', () => {
    expect(new FileService(root).readText('ast/missing.xml')).toBeNull();
  });

  it('returns null instead of throwing when the read itself fails', () => {
    // readFileSync raises EISDIR on a directory
    expect(new FileService(root).readText('ast')).toBeNull();
  });

  it('refuses paths outside the root', () => {
    const files = new FileService(root);
    expect(files.readText('../secret.xml')).toBeNull();
    expect(files.readText(outside)).toBeNull();
  });
});
