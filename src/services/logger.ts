/**
 * logger.ts
 * Structured logger for the graph build pipeline.
 *
 * Use ConsoleLogger in the CLI; SilentLogger in tests or when callers
 * do not care about output. Every pipeline stage accepts an optional Logger
 * and defaults to SilentLogger.
 *
 * Line format: `HH:MM:SS.mmm [hdlgraph] [LEVEL] message  {"context":...}`
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_LABEL: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/** Parse a `--log-level` value; returns null for anything unrecognized. */
export function parseLogLevel(value: string): LogLevel | null {
  return isLogLevel(value) ? value : null;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function formatLine(
  prefix: string,
  level: Exclude<LogLevel, 'silent'>,
  message: string,
  context?: Record<string, unknown>,
): string {
  const ts = new Date().toISOString().slice(11, 23); // HH:MM:SS.mmm
  const ctx = context !== undefined ? '  ' + JSON.stringify(context) : '';
  return `${ts} [${prefix}] [${LEVEL_LABEL[level]}] ${message}${ctx}`;
}

// ---------------------------------------------------------------------------
// LineLogger: level filtering shared by the console and file sinks
// ---------------------------------------------------------------------------

abstract class LineLogger implements Logger {
  private readonly _minLevel: number;
  protected readonly _prefix: string;

  constructor(level: LogLevel, prefix: string) {
    this._minLevel = LEVEL_ORDER[level];
    this._prefix = prefix;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._log('error', message, context);
  }

  protected abstract _emit(level: Exclude<LogLevel, 'silent'>, line: string): void;

  private _log(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (this._minLevel > LEVEL_ORDER[level]) return;
    this._emit(level, formatLine(this._prefix, level, message, context));
  }
}

// ---------------------------------------------------------------------------
// ConsoleLogger: warnings and errors go to stderr
// ---------------------------------------------------------------------------

export class ConsoleLogger extends LineLogger {
  constructor(level: LogLevel = 'info', prefix = 'hdlgraph') {
    super(level, prefix);
  }

  protected override _emit(level: Exclude<LogLevel, 'silent'>, line: string): void {
    if (level === 'warn' || level === 'error') {
      process.stderr.write(line + '\n');
    } else {
      process.stdout.write(line + '\n');
    }
  }
}

// ---------------------------------------------------------------------------
// FileLogger: buffers lines and writes them on flush (for --debug audits)
// ---------------------------------------------------------------------------

export class FileLogger extends LineLogger {
  private readonly _lines: string[] = [];

  constructor(level: LogLevel = 'debug', prefix = 'hdlgraph') {
    super(level, prefix);
  }

  /** Lines buffered so far. */
  get lines(): readonly string[] {
    return this._lines;
  }

  /** Flush accumulated log lines to a file. */
  flush(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, this._lines.join('\n') + '\n', 'utf-8');
  }

  protected override _emit(_level: Exclude<LogLevel, 'silent'>, line: string): void {
    this._lines.push(line);
  }
}

// ---------------------------------------------------------------------------
// TeeLogger: writes to both console and file
// ---------------------------------------------------------------------------

export class TeeLogger implements Logger {
  private readonly _console: ConsoleLogger;
  private readonly _file: FileLogger;

  constructor(level: LogLevel = 'debug', prefix = 'hdlgraph') {
    this._console = new ConsoleLogger(level, prefix);
    this._file = new FileLogger(level, prefix);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this._console.debug(message, context);
    this._file.debug(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this._console.info(message, context);
    this._file.info(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this._console.warn(message, context);
    this._file.warn(message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this._console.error(message, context);
    this._file.error(message, context);
  }

  flush(filePath: string): void {
    this._file.flush(filePath);
  }
}

// ---------------------------------------------------------------------------
// SilentLogger: used as default when no logger is supplied
// ---------------------------------------------------------------------------

export class SilentLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
