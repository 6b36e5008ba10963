/**
 * errors.ts
 * Error taxonomy for the graph builder.
 *
 * Every class carries enough context to become a `Diagnostic`. Recoverable
 * errors are never thrown out of a stage: they are added to the stage's
 * `DiagnosticCollector`. Only fatal conditions on the requested top module
 * (and configuration/validation failures) are thrown.
 */

import type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticSeverity,
  PipelineStage,
} from '../models/diagnostics.js';

export abstract class HdlGraphError extends Error {
  abstract readonly code: DiagnosticCode;
  abstract readonly severity: DiagnosticSeverity;
  readonly modulePath: string;

  constructor(modulePath: string, message: string) {
    super(message);
    this.modulePath = modulePath;
  }

  toDiagnostic(stage: PipelineStage): Diagnostic {
    return {
      code: this.code,
      severity: this.severity,
      stage,
      modulePath: this.modulePath,
      message: this.message,
      ...this.details(),
    };
  }

  protected details(): Partial<Diagnostic> {
    return {};
  }
}

/** A required structural element is missing. Fatal for the module only. */
export class MalformedAstError extends HdlGraphError {
  readonly code = 'MalformedAst';
  readonly severity = 'fatal';

  constructor(modulePath: string, message: string) {
    super(modulePath, message);
    this.name = 'MalformedAstError';
  }
}

/** An instantiation path re-enters a module already on the path. */
export class HierarchyCycleError extends HdlGraphError {
  readonly code = 'HierarchyCycle';
  readonly severity = 'error';
  readonly cycle: string[];

  constructor(cycle: string[]) {
    const first = cycle[0] ?? '';
    super(first, `Instantiation cycle ${cycle.join('.')}; subtree truncated`);
    this.name = 'HierarchyCycleError';
    this.cycle = cycle;
  }

  protected override details(): Partial<Diagnostic> {
    return { cycle: [...this.cycle] };
  }
}

/** A module or port name could not be bound to a definition. */
export class UnresolvedReferenceError extends HdlGraphError {
  readonly code = 'UnresolvedReference';
  readonly severity = 'error';
  readonly reference: string;

  constructor(modulePath: string, reference: string, message?: string) {
    super(modulePath, message ?? `Unresolved reference "${reference}"`);
    this.name = 'UnresolvedReferenceError';
    this.reference = reference;
  }

  protected override details(): Partial<Diagnostic> {
    return { reference: this.reference };
  }
}

/** A statement outside the supported subset; rendered as an opaque fragment. */
export class UnsupportedConstructError extends HdlGraphError {
  readonly code = 'UnsupportedConstruct';
  readonly severity = 'error';
  readonly construct: string;

  constructor(modulePath: string, construct: string, message?: string) {
    super(modulePath, message ?? `Unsupported construct "${construct}"`);
    this.name = 'UnsupportedConstructError';
    this.construct = construct;
  }

  protected override details(): Partial<Diagnostic> {
    return { construct: this.construct };
  }
}

/** Bits that cannot be grouped unambiguously; they fall back to per-bit edges. */
export class BusGroupingConflictError extends HdlGraphError {
  readonly code = 'BusGroupingConflict';
  readonly severity = 'error';
  readonly reference: string;

  constructor(modulePath: string, baseName: string, message: string) {
    super(modulePath, message);
    this.name = 'BusGroupingConflictError';
    this.reference = baseName;
  }

  protected override details(): Partial<Diagnostic> {
    return { reference: this.reference };
  }
}

/** An AST node kind the normalizer does not know; the node is skipped. */
export class UnknownNodeKindWarning extends HdlGraphError {
  readonly code = 'UnknownNodeKind';
  readonly severity = 'warning';
  readonly construct: string;

  constructor(modulePath: string, tag: string) {
    super(modulePath, `Skipped unknown AST node <${tag}>`);
    this.name = 'UnknownNodeKindWarning';
    this.construct = tag;
  }

  protected override details(): Partial<Diagnostic> {
    return { construct: this.construct };
  }
}

/** Invalid style or build configuration. Always thrown. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
