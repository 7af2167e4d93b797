import type { BandwidthMeter } from '../../shared/types/interfaces.js';
import type { BandwidthEstimateEvent } from '../types/evaluators.js';
import { NO_ESTIMATE } from '../../shared/types/interfaces.js';
import { EvaluatorConfigError } from '../evaluators/errors.js';

export interface EwmaBandwidthMeterConfig {
  /** Weight of the newest sample (0, 1] */
  alpha?: number;
  /** Samples required before an estimate is reported */
  minSamples?: number;
}

/**
 * Exponentially weighted moving average of transfer throughput
 * The host's downloader reports every completed transfer through onTransferSample
 */
export class EwmaBandwidthMeter extends EventTarget implements BandwidthMeter {
  private readonly alpha: number;
  private readonly minSamples: number;
  private estimate = 0;
  private sampleCount = 0;

  constructor(config: EwmaBandwidthMeterConfig = {}) {
    super();
    const alpha = config.alpha ?? 0.3;
    const minSamples = config.minSamples ?? 1;
    if (!(alpha > 0 && alpha <= 1)) {
      throw new EvaluatorConfigError(`alpha must be in (0, 1], got ${alpha}`);
    }
    if (!Number.isInteger(minSamples) || minSamples < 1) {
      throw new EvaluatorConfigError(`minSamples must be a positive integer, got ${minSamples}`);
    }
    this.alpha = alpha;
    this.minSamples = minSamples;
  }

  /**
   * Record a completed transfer
   * @param bytes - Bytes transferred
   * @param elapsedMs - Wall time the transfer took; non-positive or non-finite values are ignored
   */
  onTransferSample(bytes: number, elapsedMs: number): void {
    if (!Number.isFinite(bytes) || !Number.isFinite(elapsedMs) || elapsedMs <= 0 || bytes < 0)
      return;

    const bitrate = (bytes * 8 * 1000) / elapsedMs;
    this.estimate = this.sampleCount === 0
      ? bitrate
      : this.alpha * bitrate + (1 - this.alpha) * this.estimate;
    this.sampleCount++;

    const estimate = this.getBitrateEstimate();
    if (estimate !== NO_ESTIMATE) {
      this.dispatchEvent(new CustomEvent<BandwidthEstimateEvent>('bandwidthestimate', {
        detail: { bitrate: estimate, sampleCount: this.sampleCount },
      }));
    }
  }

  getBitrateEstimate(): number {
    if (this.sampleCount < this.minSamples)
      return NO_ESTIMATE;
    return Math.round(this.estimate);
  }

  getSampleCount(): number {
    return this.sampleCount;
  }

  reset(): void {
    this.estimate = 0;
    this.sampleCount = 0;
  }
}

/**
 * Reports whatever bitrate it was last given
 * Useful when the host computes its own estimate, and in tests
 */
export class StaticBandwidthMeter implements BandwidthMeter {
  private bitrate: number;

  constructor(bitrate: number = NO_ESTIMATE) {
    this.bitrate = bitrate;
  }

  setBitrateEstimate(bitrate: number): void {
    this.bitrate = bitrate;
  }

  getBitrateEstimate(): number {
    return this.bitrate;
  }
}
