import type { Evaluation } from '../../shared/types/evaluation.js';
import type { Format, MediaChunk } from '../../shared/types/interfaces.js';
import type { BaseEvaluatorConfig, EvaluationEvent, FormatEvaluator } from '../types/evaluators.js';
import { nanoid } from 'nanoid';
import { EvaluatorError } from './errors.js';

/**
 * Shared lifecycle and observability for the built-in evaluators
 *
 * Decisions are reported through an 'evaluation' CustomEvent rather than from
 * inside the selection logic. Listeners run synchronously on the caller's loop.
 */
export abstract class BaseFormatEvaluator<TEvent extends EvaluationEvent = EvaluationEvent>
  extends EventTarget
  implements FormatEvaluator {
  /** Distinguishes events from evaluators serving different tracks */
  readonly id: string;
  abstract readonly name: string;

  protected readonly enableLogging: boolean;
  private enabled = false;

  constructor(config: BaseEvaluatorConfig = {}) {
    super();
    this.id = nanoid(10);
    this.enableLogging = config.enableLogging ?? false;
  }

  enable(): void {
    if (this.enabled)
      return;
    this.enabled = true;
    this.onEnable();
  }

  disable(): void {
    if (!this.enabled)
      return;
    this.enabled = false;
    this.onDisable();
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  abstract evaluate(
    queue: readonly MediaChunk[],
    playbackPositionUs: number,
    formats: readonly Format[],
    evaluation: Evaluation,
  ): void;

  /**
   * Hook for subclasses holding resources while enabled
   */
  protected onEnable(): void {
    // No-op
  }

  protected onDisable(): void {
    // No-op
  }

  protected assertFormats(formats: readonly Format[]): void {
    if (formats.length === 0) {
      throw new EvaluatorError(`${this.name}: formats must not be empty`);
    }
  }

  /**
   * Common event fields for a completed evaluation
   */
  protected describe(previous: Format | null, evaluation: Evaluation): EvaluationEvent {
    return {
      evaluatorId: this.id,
      evaluator: this.name,
      formatId: evaluation.format?.id ?? '',
      previousFormatId: previous?.id ?? null,
      trigger: evaluation.trigger,
      queueSize: evaluation.queueSize,
      timestamp: Date.now(),
    };
  }

  protected emitEvaluation(detail: TEvent): void {
    this.dispatchEvent(new CustomEvent<TEvent>('evaluation', { detail }));

    if (this.enableLogging) {
      // eslint-disable-next-line no-console
      console.log(
        `[${this.name}] ${this.id}: ${detail.previousFormatId ?? 'none'} -> ${detail.formatId} (trigger ${detail.trigger}, queue ${detail.queueSize})`,
      );
    }
  }
}
