/**
 * Accessors transform exports.
 */
export * from './types.js';
export { capitalize, accessorNames } from './naming.js';
export { collectDeclarations, DEFAULT_ENTRY_POINTS, type CollectOptions, type CollectedDeclarations } from './collector.js';
export { RewriteSession } from './session.js';
export { RewritePlanner, getterCall, setterCall, stepCall, type Anchor, type Placement } from './planner.js';
export { AccessSiteClassifier } from './classifier.js';
export { synthesizeAccessors, planAggregateRewrites, applyAggregatePlan } from './synthesizer.js';
export { AccessorsOptionsSchema, parseAccessorsOptions, type AccessorsOptions } from './options.js';
export {
  AccessorsTransform,
  createAccessorsTransform,
  type AccessorsConfig,
  type AccessorsPlan,
  type AccessorsRun,
} from './transform.js';
