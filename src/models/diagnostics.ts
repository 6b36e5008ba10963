/**
 * diagnostics.ts
 * Serializable report entries collected during a build.
 */

export type DiagnosticCode =
  | 'MalformedAst'
  | 'HierarchyCycle'
  | 'UnresolvedReference'
  | 'UnsupportedConstruct'
  | 'BusGroupingConflict'
  | 'UnknownNodeKind';

/**
 * - fatal: the affected module could not be built.
 * - error: recoverable; the model carries a best-effort result.
 * - warning: input was skipped.
 */
export type DiagnosticSeverity = 'fatal' | 'error' | 'warning';

export type PipelineStage =
  | 'read'
  | 'normalize'
  | 'resolve'
  | 'structure'
  | 'aggregate'
  | 'extract'
  | 'emit';

export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  stage: PipelineStage;
  /** Module name or hierarchical path the entry belongs to. */
  modulePath: string;
  message: string;
  /** Missing reference (module or `module.port`). */
  reference?: string;
  /** Unsupported construct or unknown node kind. */
  construct?: string;
  /** Module names along a cyclic instantiation path. */
  cycle?: string[];
}
