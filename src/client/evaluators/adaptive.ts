import type { Evaluation } from '../../shared/types/evaluation.js';
import type { AdaptiveEvaluatorConfig, BandwidthMeter, Format, MediaChunk } from '../../shared/types/interfaces.js';
import type {
  AdaptiveDecision,
  AdaptiveEvaluationEvent,
  AdaptiveEvaluatorOptions,
  BandwidthEstimateEvent,
} from '../types/evaluators.js';
import { isSameFormat } from '../../shared/types/evaluation.js';
import { DEFAULT_ADAPTIVE_CONFIG, NO_ESTIMATE, Trigger } from '../../shared/types/interfaces.js';
import { msToUs } from '../../shared/utils/time.js';
import { BaseFormatEvaluator } from './base.js';
import { EvaluatorConfigError } from './errors.js';

/** Chunks at or above either dimension count as HD and are never discarded */
const HD_MIN_HEIGHT = 720;
const HD_MIN_WIDTH = 1280;

function isBandwidthEstimateEvent(value: unknown): value is BandwidthEstimateEvent {
  return typeof value === 'object' && value !== null
    && 'bitrate' in value && typeof value.bitrate === 'number'
    && 'sampleCount' in value && typeof value.sampleCount === 'number';
}

/**
 * An adaptive evaluator for video formats, which attempts to select the best quality
 * possible given the current network conditions and state of the buffer
 *
 * Intended for video tracks. Audio tracks need their own tuning.
 */
export class AdaptiveEvaluator extends BaseFormatEvaluator<AdaptiveEvaluationEvent> {
  readonly name = 'AdaptiveEvaluator';

  private readonly bandwidthMeter: BandwidthMeter;
  private readonly maxInitialBitrate: number;
  private readonly minDurationForQualityIncreaseUs: number;
  private readonly maxDurationForQualityDecreaseUs: number;
  private readonly minDurationToRetainAfterDiscardUs: number;
  private readonly bandwidthFraction: number;

  /**
   * @param bandwidthMeter - Provides an estimate of the currently available bandwidth.
   *   When it is also an EventTarget, its estimates are forwarded while enabled
   */
  constructor(bandwidthMeter: BandwidthMeter, options: AdaptiveEvaluatorOptions = {}) {
    super(options);
    const config: AdaptiveEvaluatorConfig = {
      maxInitialBitrate: options.maxInitialBitrate ?? DEFAULT_ADAPTIVE_CONFIG.maxInitialBitrate,
      minDurationForQualityIncreaseMs: options.minDurationForQualityIncreaseMs
        ?? DEFAULT_ADAPTIVE_CONFIG.minDurationForQualityIncreaseMs,
      maxDurationForQualityDecreaseMs: options.maxDurationForQualityDecreaseMs
        ?? DEFAULT_ADAPTIVE_CONFIG.maxDurationForQualityDecreaseMs,
      minDurationToRetainAfterDiscardMs: options.minDurationToRetainAfterDiscardMs
        ?? DEFAULT_ADAPTIVE_CONFIG.minDurationToRetainAfterDiscardMs,
      bandwidthFraction: options.bandwidthFraction ?? DEFAULT_ADAPTIVE_CONFIG.bandwidthFraction,
    };
    validateConfig(config);

    this.bandwidthMeter = bandwidthMeter;
    this.maxInitialBitrate = config.maxInitialBitrate;
    this.minDurationForQualityIncreaseUs = msToUs(config.minDurationForQualityIncreaseMs);
    this.maxDurationForQualityDecreaseUs = msToUs(config.maxDurationForQualityDecreaseMs);
    this.minDurationToRetainAfterDiscardUs = msToUs(config.minDurationToRetainAfterDiscardMs);
    this.bandwidthFraction = config.bandwidthFraction;
  }

  evaluate(
    queue: readonly MediaChunk[],
    playbackPositionUs: number,
    formats: readonly Format[],
    evaluation: Evaluation,
  ): void {
    this.assertFormats(formats);

    const bufferedDurationUs = queue.length === 0
      ? 0
      : queue[queue.length - 1].endTimeUs - playbackPositionUs;
    const current = evaluation.format;
    const effectiveBitrate = this.computeEffectiveBitrateEstimate(this.bandwidthMeter.getBitrateEstimate());
    const idealFormat = this.findIdealFormat(formats, effectiveBitrate);

    let selected = idealFormat;
    let decision: AdaptiveDecision = current === null ? 'initial' : 'hold';
    let discardFromIndex: number | null = null;

    if (current !== null && idealFormat.bitrate > current.bitrate) {
      decision = 'switch-up';
      if (bufferedDurationUs < this.minDurationForQualityIncreaseUs) {
        // Not enough buffer to ride out the larger chunks arriving
        selected = current;
        decision = 'defer-up';
      } else if (bufferedDurationUs >= this.minDurationToRetainAfterDiscardUs) {
        const discardIndex = this.findDiscardIndex(queue, playbackPositionUs, idealFormat);
        if (discardIndex !== null && discardIndex < evaluation.queueSize) {
          evaluation.queueSize = discardIndex;
          discardFromIndex = discardIndex;
        }
      }
    } else if (current !== null && idealFormat.bitrate < current.bitrate) {
      decision = 'switch-down';
      if (bufferedDurationUs >= this.maxDurationForQualityDecreaseUs) {
        // Enough buffer to keep the current quality for now
        selected = current;
        decision = 'defer-down';
      }
    }

    if (current !== null && !isSameFormat(selected, current)) {
      evaluation.trigger = Trigger.ADAPTIVE;
    }
    evaluation.format = selected;

    this.emitEvaluation({
      ...this.describe(current, evaluation),
      idealFormatId: idealFormat.id,
      bufferedDurationUs,
      effectiveBitrate,
      decision,
      discardFromIndex,
    });
  }

  /**
   * Compute the ideal format ignoring buffer health
   */
  determineIdealFormat(formats: readonly Format[], bitrateEstimate: number): Format {
    this.assertFormats(formats);
    return this.findIdealFormat(formats, this.computeEffectiveBitrateEstimate(bitrateEstimate));
  }

  /**
   * Apply the bandwidth fraction, or the initial bitrate in absence of an estimate
   */
  computeEffectiveBitrateEstimate(bitrateEstimate: number): number {
    return bitrateEstimate === NO_ESTIMATE
      ? this.maxInitialBitrate
      : Math.trunc(bitrateEstimate * this.bandwidthFraction);
  }

  protected override onEnable(): void {
    if (this.bandwidthMeter instanceof EventTarget) {
      this.bandwidthMeter.addEventListener('bandwidthestimate', this.handleBandwidthEstimate);
    }
  }

  protected override onDisable(): void {
    if (this.bandwidthMeter instanceof EventTarget) {
      this.bandwidthMeter.removeEventListener('bandwidthestimate', this.handleBandwidthEstimate);
    }
  }

  private findIdealFormat(formats: readonly Format[], effectiveBitrate: number): Format {
    for (const format of formats) {
      if (format.bitrate <= effectiveBitrate)
        return format;
    }
    // Nothing is affordable; fall back to the lowest quality
    return formats[formats.length - 1];
  }

  /**
   * First buffered chunk, after the one about to play, that is lower bandwidth,
   * lower resolution and not HD, and starts late enough to keep the retained minimum
   */
  private findDiscardIndex(
    queue: readonly MediaChunk[],
    playbackPositionUs: number,
    idealFormat: Format,
  ): number | null {
    for (let i = 1; i < queue.length; i++) {
      const chunk = queue[i];
      const durationBeforeChunkUs = chunk.startTimeUs - playbackPositionUs;
      if (durationBeforeChunkUs >= this.minDurationToRetainAfterDiscardUs
        && chunk.format.bitrate < idealFormat.bitrate
        && chunk.format.height < idealFormat.height
        && chunk.format.height < HD_MIN_HEIGHT
        && chunk.format.width < HD_MIN_WIDTH) {
        return i;
      }
    }
    return null;
  }

  private readonly handleBandwidthEstimate = (event: Event): void => {
    if (!(event instanceof CustomEvent))
      return;
    const detail: unknown = event.detail;
    if (!isBandwidthEstimateEvent(detail))
      return;

    this.dispatchEvent(new CustomEvent<BandwidthEstimateEvent>('bandwidthestimate', { detail }));

    if (this.enableLogging) {
      // eslint-disable-next-line no-console
      console.log(`[${this.name}] ${this.id}: bandwidth estimate ${detail.bitrate} bps (${detail.sampleCount} samples)`);
    }
  };
}

function validateConfig(config: AdaptiveEvaluatorConfig): void {
  if (!(config.maxInitialBitrate > 0)) {
    throw new EvaluatorConfigError(`maxInitialBitrate must be positive, got ${config.maxInitialBitrate}`);
  }
  if (!(config.bandwidthFraction > 0 && config.bandwidthFraction <= 1)) {
    throw new EvaluatorConfigError(`bandwidthFraction must be in (0, 1], got ${config.bandwidthFraction}`);
  }
  const durations: Array<[string, number]> = [
    ['minDurationForQualityIncreaseMs', config.minDurationForQualityIncreaseMs],
    ['maxDurationForQualityDecreaseMs', config.maxDurationForQualityDecreaseMs],
    ['minDurationToRetainAfterDiscardMs', config.minDurationToRetainAfterDiscardMs],
  ];
  for (const [key, value] of durations) {
    if (!Number.isFinite(value) || value < 0) {
      throw new EvaluatorConfigError(`${key} must be a non-negative number, got ${value}`);
    }
  }
}
