/**
 * origin.ts
 * Provenance pointer mapping IR objects back to the HDL source that produced
 * the AST node.
 *
 * Verilator encodes locations as `loc="<fileId>,<startLine>,<startCol>,<endLine>,<endCol>"`,
 * where `fileId` refers to an entry in the document's `<files>` table.
 */

export interface Origin {
  /** Source file name, resolved through the AST file table when possible. */
  file: string;
  /** 1-based start line. */
  startLine?: number;
  /** 1-based start column. */
  startCol?: number;
  /** 1-based end line. */
  endLine?: number;
  /** 1-based end column. */
  endCol?: number;
}

/** Origin used when the AST carries no location attribute. */
export const UNKNOWN_ORIGIN: Origin = { file: '' };
