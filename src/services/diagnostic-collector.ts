/**
 * diagnostic-collector.ts
 * Per-stage accumulator for recoverable errors.
 *
 * The orchestrator hands every stage its own collector and merges them once,
 * in pipeline order, when the run ends. Stages never share a collector.
 */

import type { Diagnostic, PipelineStage } from '../models/diagnostics.js';
import type { HdlGraphError } from './errors.js';

export class DiagnosticCollector {
  readonly stage: PipelineStage;
  private readonly _errors: HdlGraphError[] = [];

  constructor(stage: PipelineStage) {
    this.stage = stage;
  }

  add(error: HdlGraphError): void {
    this._errors.push(error);
  }

  get errors(): readonly HdlGraphError[] {
    return this._errors;
  }

  get size(): number {
    return this._errors.length;
  }

  toDiagnostics(): Diagnostic[] {
    return this._errors.map((e) => e.toDiagnostic(this.stage));
  }
}

/** Concatenate collectors in the order given (pipeline order). */
export function mergeDiagnostics(collectors: readonly DiagnosticCollector[]): Diagnostic[] {
  return collectors.flatMap((c) => c.toDiagnostics());
}
