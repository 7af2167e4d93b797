// Evaluators
export { AdaptiveEvaluator } from './evaluators/adaptive.js';
export { BaseFormatEvaluator } from './evaluators/base.js';
export { FixedEvaluator, LoopEvaluator, RandomEvaluator } from './evaluators/default.js';
export { createFormatEvaluator } from './evaluators/factory.js';

// Error types
export {
  EvaluatorConfigError,
  EvaluatorError,
  EvaluatorStateError,
  FormatNotFoundError,
} from './evaluators/errors.js';

// Bandwidth estimation
export { EwmaBandwidthMeter, StaticBandwidthMeter } from './bandwidth/bandwidth-meter.js';
export type { EwmaBandwidthMeterConfig } from './bandwidth/bandwidth-meter.js';

// Per-track session helper
export { AdaptationSession } from './core/session.js';
export type { FormatSelection } from './core/session.js';

export type {
  AdaptiveDecision,
  AdaptiveEvaluationEvent,
  AdaptiveEvaluatorOptions,
  BandwidthEstimateEvent,
  BaseEvaluatorConfig,
  EvaluationEvent,
  EvaluatorConfig,
  FixedEvaluatorConfig,
  FixedFallback,
  FormatEvaluator,
  LoopEvaluatorConfig,
  RandomEvaluatorConfig,
} from './types/evaluators.js';
