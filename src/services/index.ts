/**
 * services/index.ts
 * Barrel export for the build's utility services.
 */

export { FileService } from './file-service.js';
export { ModelValidator, ValidationError } from './model-validator.js';
export type { ValidatableModel } from './model-validator.js';
export { ModelExporter } from './model-exporter.js';
export { loadStyleConfig, parseStyleConfig } from './style-config-loader.js';
export { DiagnosticCollector, mergeDiagnostics } from './diagnostic-collector.js';
export {
  HdlGraphError,
  MalformedAstError,
  HierarchyCycleError,
  UnresolvedReferenceError,
  UnsupportedConstructError,
  BusGroupingConflictError,
  UnknownNodeKindWarning,
  ConfigError,
} from './errors.js';
export { ConsoleLogger, FileLogger, TeeLogger, SilentLogger, parseLogLevel } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
