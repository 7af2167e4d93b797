import type { EvaluatorConfig } from '../types/evaluators.js';
import type { BaseFormatEvaluator } from './base.js';
import { AdaptiveEvaluator } from './adaptive.js';
import { FixedEvaluator, LoopEvaluator, RandomEvaluator } from './default.js';

/**
 * Build an evaluator from a declarative configuration
 * @throws EvaluatorConfigError when options are out of range
 */
export function createFormatEvaluator(config: EvaluatorConfig): BaseFormatEvaluator {
  switch (config.type) {
    case 'fixed':
      return new FixedEvaluator(config);
    case 'random':
      return new RandomEvaluator(config);
    case 'loop':
      return new LoopEvaluator(config);
    case 'adaptive': {
      const { bandwidthMeter, ...options } = config;
      return new AdaptiveEvaluator(bandwidthMeter, options);
    }
  }
}
