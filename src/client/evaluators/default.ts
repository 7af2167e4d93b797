import type { Evaluation } from '../../shared/types/evaluation.js';
import type { Format, MediaChunk } from '../../shared/types/interfaces.js';
import type { RandomSource } from '../../shared/utils/random.js';
import type {
  FixedEvaluatorConfig,
  FixedFallback,
  LoopEvaluatorConfig,
  RandomEvaluatorConfig,
} from '../types/evaluators.js';
import { isSameFormat } from '../../shared/types/evaluation.js';
import { Trigger } from '../../shared/types/interfaces.js';
import { SeededRandom } from '../../shared/utils/random.js';
import { BaseFormatEvaluator } from './base.js';
import { EvaluatorConfigError, FormatNotFoundError } from './errors.js';

/**
 * Always selects the format with the configured height
 * Height 0 selects the lowest quality format
 */
export class FixedEvaluator extends BaseFormatEvaluator {
  readonly name = 'FixedEvaluator';

  private readonly height: number;
  private readonly fallback: FixedFallback;

  constructor(config: FixedEvaluatorConfig = {}) {
    super(config);
    const height = config.height ?? 0;
    if (!Number.isInteger(height) || height < 0) {
      throw new EvaluatorConfigError(`height must be a non-negative integer, got ${height}`);
    }
    this.height = height;
    this.fallback = config.fallback ?? 'nearest';
  }

  /**
   * Check a catalog up front, before playback starts
   * @throws FormatNotFoundError when no format has exactly the configured height
   */
  validate(formats: readonly Format[]): void {
    if (this.height === 0)
      return;
    if (!formats.some(format => format.height === this.height)) {
      throw new FormatNotFoundError(this.height);
    }
  }

  evaluate(
    _queue: readonly MediaChunk[],
    _playbackPositionUs: number,
    formats: readonly Format[],
    evaluation: Evaluation,
  ): void {
    this.assertFormats(formats);
    const previous = evaluation.format;
    evaluation.format = this.selectFormat(formats);
    this.emitEvaluation(this.describe(previous, evaluation));
  }

  private selectFormat(formats: readonly Format[]): Format {
    const lowest = formats[formats.length - 1];
    if (this.height === 0)
      return lowest;

    // Several formats may share a height; the last (lowest bitrate) one wins
    let match: Format | null = null;
    for (const format of formats) {
      if (format.height === this.height)
        match = format;
    }
    if (match)
      return match;

    if (this.fallback === 'error') {
      throw new FormatNotFoundError(this.height);
    }

    let nearest = lowest;
    let nearestDistance = Number.POSITIVE_INFINITY;
    for (const format of formats) {
      const distance = Math.abs(format.height - this.height);
      if (distance <= nearestDistance) {
        nearest = format;
        nearestDistance = distance;
      }
    }
    return nearest;
  }
}

/**
 * Selects randomly between the available formats
 */
export class RandomEvaluator extends BaseFormatEvaluator {
  readonly name = 'RandomEvaluator';

  private readonly random: RandomSource;

  constructor(config: RandomEvaluatorConfig = {}) {
    super(config);
    this.random = config.random ?? new SeededRandom(config.seed);
  }

  evaluate(
    _queue: readonly MediaChunk[],
    _playbackPositionUs: number,
    formats: readonly Format[],
    evaluation: Evaluation,
  ): void {
    this.assertFormats(formats);
    const previous = evaluation.format;
    const next = formats[this.random.nextInt(formats.length)];

    if (previous !== null && !isSameFormat(previous, next)) {
      evaluation.trigger = Trigger.ADAPTIVE;
    }
    evaluation.format = next;
    this.emitEvaluation(this.describe(previous, evaluation));
  }
}

/**
 * Cycles from the lowest to the highest quality, moving on every switchInterval calls
 * Meant for demos and deterministic tests, not for production adaptation
 */
export class LoopEvaluator extends BaseFormatEvaluator {
  readonly name = 'LoopEvaluator';

  private readonly switchInterval: number;
  private cursor = 0;
  private calls = 0;

  constructor(config: LoopEvaluatorConfig = {}) {
    super(config);
    const switchInterval = config.switchInterval ?? 3;
    if (!Number.isInteger(switchInterval) || switchInterval < 1) {
      throw new EvaluatorConfigError(`switchInterval must be a positive integer, got ${switchInterval}`);
    }
    this.switchInterval = switchInterval;
  }

  evaluate(
    _queue: readonly MediaChunk[],
    _playbackPositionUs: number,
    formats: readonly Format[],
    evaluation: Evaluation,
  ): void {
    this.assertFormats(formats);
    const previous = evaluation.format;

    this.calls++;
    const next = formats[formats.length - 1 - (this.cursor % formats.length)];
    // The advanced cursor applies from the next call on
    if (this.calls % this.switchInterval === 0) {
      this.cursor = (this.cursor + 1) % formats.length;
    }

    if (previous !== null && !isSameFormat(previous, next)) {
      evaluation.trigger = Trigger.ADAPTIVE;
    }
    evaluation.format = next;
    this.emitEvaluation(this.describe(previous, evaluation));
  }

  getCursor(): number {
    return this.cursor;
  }

  reset(): void {
    this.cursor = 0;
    this.calls = 0;
  }
}
