/**
 * logger.test.ts
 *
 * Level filtering and line format of the file sink, plus per-stage
 * diagnostic collection and merge order.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DiagnosticCollector, mergeDiagnostics } from '../diagnostic-collector.js';
import { HierarchyCycleError, UnknownNodeKindWarning, UnresolvedReferenceError } from '../errors.js';
import { FileLogger, parseLogLevel } from '../logger.js';

const LINE = /^\d{2}:\d{2}:\d{2}\.\d{3} \[hdlgraph\] \[(DEBUG|INFO |WARN |ERROR)\] /;

describe('FileLogger', () => {
  it('drops lines below the configured level', () => {
    const log = new FileLogger('warn');
    log.debug('d');
    log.info('i');
    log.warn('w');
    log.error('e', { module: 'top' });

    expect(log.lines).toHaveLength(2);
    expect(log.lines[0]).toMatch(LINE);
    expect(log.lines[0]?.replace(LINE, '')).toBe('w');
    expect(log.lines[1]?.replace(LINE, '')).toBe('e  {"module":"top"}');
  });

  it('flushes buffered lines to a file, creating directories', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hdlgraph-log-'));
    const log = new FileLogger('debug', 'test');
    log.info('Step 1/6  Normalize');
    const file = path.join(dir, 'nested', 'build.log');
    log.flush(file);

    const text = fs.readFileSync(file, 'utf-8');
    expect(text.endsWith('[test] [INFO ] Step 1/6  Normalize\n')).toBe(true);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe('parseLogLevel', () => {
  it('accepts known levels only', () => {
    expect(parseLogLevel('debug')).toBe('debug');
    expect(parseLogLevel('silent')).toBe('silent');
    expect(parseLogLevel('verbose')).toBeNull();
    expect(parseLogLevel('toString')).toBeNull();
  });
});

describe('DiagnosticCollector', () => {
  it('stamps the stage and merges in the order given', () => {
    const normalize = new DiagnosticCollector('normalize');
    const resolve = new DiagnosticCollector('resolve');
    resolve.add(new HierarchyCycleError(['A', 'B', 'A']));
    normalize.add(new UnknownNodeKindWarning('top', 'strength'));
    resolve.add(new UnresolvedReferenceError('top', 'ghost'));

    expect(resolve.size).toBe(2);
    expect(mergeDiagnostics([normalize, resolve])).toEqual([
      {
        code: 'UnknownNodeKind',
        severity: 'warning',
        stage: 'normalize',
        modulePath: 'top',
        message: 'Skipped unknown AST node <strength>',
        construct: 'strength',
      },
      {
        code: 'HierarchyCycle',
        severity: 'error',
        stage: 'resolve',
        modulePath: 'A',
        message: 'Instantiation cycle A.B.A; subtree truncated',
        cycle: ['A', 'B', 'A'],
      },
      {
        code: 'UnresolvedReference',
        severity: 'error',
        stage: 'resolve',
        modulePath: 'top',
        message: 'Unresolved reference "ghost"',
        reference: 'ghost',
      },
    ]);
  });
});
