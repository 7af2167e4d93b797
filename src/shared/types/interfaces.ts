/**
 * Core type definitions and interfaces for format evaluation
 * Shared across evaluators, bandwidth meters and sessions
 */

/**
 * One encoded quality variant of the media
 * Arrays of formats handed to evaluators are ordered by strictly decreasing bitrate
 */
export interface Format {
  readonly id: string;
  /** Bits per second */
  readonly bitrate: number;
  readonly width: number;
  readonly height: number;
}

/**
 * A downloaded, not yet played unit of media
 * Times are on the media timeline in microseconds
 */
export interface MediaChunk {
  readonly format: Format;
  readonly startTimeUs: number;
  readonly endTimeUs: number;
}

/**
 * Reason codes explaining why the selected format was chosen
 * Implementations may define custom codes greater than or equal to CUSTOM_BASE
 */
export const Trigger = {
  INITIAL: 0,
  MANUAL: 1,
  ADAPTIVE: 2,
  CUSTOM_BASE: 10000,
} as const;

export function isCustomTrigger(trigger: number): boolean {
  return Number.isInteger(trigger) && trigger >= Trigger.CUSTOM_BASE;
}

/**
 * Source of the current network throughput estimate
 */
export interface BandwidthMeter {
  /**
   * @returns Estimated bitrate in bits per second, or NO_ESTIMATE when none is available yet
   */
  getBitrateEstimate: () => number;
}

/** Sentinel returned by a bandwidth meter before it has an estimate */
export const NO_ESTIMATE = -1;

export interface AdaptiveEvaluatorConfig {
  /** Bitrate assumed when the bandwidth meter has no estimate yet (bits/s) */
  maxInitialBitrate: number;
  /** Minimum buffered duration required before switching to a higher quality */
  minDurationForQualityIncreaseMs: number;
  /** Buffered duration at or above which a switch to a lower quality is deferred */
  maxDurationForQualityDecreaseMs: number;
  /** Minimum duration of lower quality media kept when discarding after a switch up */
  minDurationToRetainAfterDiscardMs: number;
  /** Fraction of the estimated bandwidth considered available (0, 1] */
  bandwidthFraction: number;
}

export const DEFAULT_ADAPTIVE_CONFIG: AdaptiveEvaluatorConfig = {
  maxInitialBitrate: 800_000,
  minDurationForQualityIncreaseMs: 10_000,
  maxDurationForQualityDecreaseMs: 25_000,
  minDurationToRetainAfterDiscardMs: 25_000,
  bandwidthFraction: 0.75,
};
