/**
 * index.ts
 * Public API: the orchestrator, the individual stages and the model types.
 */

export * from './models/index.js';
export * from './builders/index.js';
export * from './orchestrator/index.js';
export * from './services/index.js';
export { readAstDocument, readVerilatorXml, readJsonAst } from './parsers/xml/verilator-xml-reader.js';
export { HdlExprUtils } from './parsers/hdl/hdl-expr-utils.js';
export type { LiteralValue, BitSlice, DeclaredRange } from './parsers/hdl/hdl-expr-utils.js';
export { GraphEmitter, busLabel, penWidth, fragmentTooltip } from './visualization/graph-emitter.js';
export { levelId, buildModulePalette } from './visualization/viz-palette.js';
