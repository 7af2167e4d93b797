/**
 * Format evaluation strategies
 * Developers can plug in custom evaluators behind the same capability set
 */

import type { Evaluation } from '../../shared/types/evaluation.js';
import type { AdaptiveEvaluatorConfig, BandwidthMeter, Format, MediaChunk } from '../../shared/types/interfaces.js';
import type { RandomSource } from '../../shared/utils/random.js';

/**
 * Selects from a number of available formats during playback
 *
 * An instance serves one track loop at a time. Tracks that adapt independently
 * (audio and video, two players) each need their own evaluator and Evaluation.
 */
export interface FormatEvaluator {
  /**
   * Called when playback of the track begins. Acquires any resources the evaluator listens to
   */
  enable: () => void;

  /**
   * Called when playback of the track stops. Releases what enable acquired
   */
  disable: () => void;

  /**
   * Update the supplied evaluation. Must not block and must leave evaluation.format set
   * @param queue - Read only view of the buffered chunks, in playback order
   * @param playbackPositionUs - Current playback position
   * @param formats - Formats to select from, ordered by decreasing bitrate
   * @param evaluation - Round-tripped evaluation record
   */
  evaluate: (
    queue: readonly MediaChunk[],
    playbackPositionUs: number,
    formats: readonly Format[],
    evaluation: Evaluation,
  ) => void;
}

/**
 * Outcome of an adaptive decision relative to the previous selection
 */
export type AdaptiveDecision = 'initial' | 'hold' | 'switch-up' | 'switch-down' | 'defer-up' | 'defer-down';

/**
 * Detail of the 'evaluation' event dispatched after every evaluate call
 */
export interface EvaluationEvent {
  evaluatorId: string;
  evaluator: string;
  formatId: string;
  previousFormatId: string | null;
  trigger: number;
  queueSize: number;
  timestamp: number;
}

export interface AdaptiveEvaluationEvent extends EvaluationEvent {
  idealFormatId: string;
  bufferedDurationUs: number;
  effectiveBitrate: number;
  decision: AdaptiveDecision;
  /** Index the queue was shrunk to, null when this call requested no discard */
  discardFromIndex: number | null;
}

/**
 * Detail of the 'bandwidthestimate' event
 */
export interface BandwidthEstimateEvent {
  bitrate: number;
  sampleCount: number;
}

export interface BaseEvaluatorConfig {
  /** Write one console line per decision */
  enableLogging?: boolean;
}

/**
 * What a fixed evaluator does when no format has the configured height
 */
export type FixedFallback = 'nearest' | 'error';

export interface FixedEvaluatorConfig extends BaseEvaluatorConfig {
  /** Target pixel height, 0 selects the lowest quality */
  height?: number;
  fallback?: FixedFallback;
}

export interface RandomEvaluatorConfig extends BaseEvaluatorConfig {
  seed?: number;
  /** Overrides the seeded generator */
  random?: RandomSource;
}

export interface LoopEvaluatorConfig extends BaseEvaluatorConfig {
  /** Number of calls between cursor advances */
  switchInterval?: number;
}

export interface AdaptiveEvaluatorOptions extends BaseEvaluatorConfig, Partial<AdaptiveEvaluatorConfig> {}

/**
 * Declarative evaluator configuration accepted by createFormatEvaluator
 */
export type EvaluatorConfig =
  | ({ type: 'fixed' } & FixedEvaluatorConfig)
  | ({ type: 'random' } & RandomEvaluatorConfig)
  | ({ type: 'loop' } & LoopEvaluatorConfig)
  | ({ type: 'adaptive'; bandwidthMeter: BandwidthMeter } & AdaptiveEvaluatorOptions);
