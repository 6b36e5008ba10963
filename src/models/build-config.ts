/**
 * build-config.ts
 * Configuration for one graph build run.
 */

/**
 * Build configuration passed to the orchestrator.
 * Paths are absolute or relative to `projectRoot`.
 */
export interface BuildConfig {
  /** Directory the AST files are read from; reads never leave it. */
  projectRoot: string;
  /** Verilator XML (`.xml`) or JSON tree (`.json`) files, one per source unit. */
  inputFiles: string[];
  /**
   * Top modules to build hierarchies for. When empty, modules flagged as top
   * by the producer are used, then modules nobody instantiates.
   */
  topModules?: string[];
  /** YAML style file for the emitter. Built-in defaults when absent. */
  styleFile?: string;
  /** Pre-evaluate constant right-hand sides. Defaults to true. */
  foldConstants?: boolean;
  /** Derive DEF→USE data-flow edges between fragments. Defaults to true. */
  dataFlow?: boolean;
  /** Keep data-flow edges between different blocks of a module. Defaults to true. */
  interBlockDataFlow?: boolean;
}
