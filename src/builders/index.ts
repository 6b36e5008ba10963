/**
 * builders/index.ts
 * Barrel export for the pipeline stages between reading and emitting.
 */

export { AstNormalizer } from './ast-normalizer.js';
export { HierarchyResolver } from './hierarchy-resolver.js';
export { StructuralModelBuilder, inferDirection, endpointText } from './structural-model-builder.js';
export { BusAggregator, bitSignature, mergeDirections } from './bus-aggregator.js';
export {
  BehavioralExtractor,
  triggerText,
  isSequentialBlock,
  preOrderFragments,
  dataFlowEdges,
} from './behavioral-extractor.js';
