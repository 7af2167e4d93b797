import type { Format, MediaChunk } from '../../shared/types/interfaces.js';
import type { FormatEvaluator } from '../types/evaluators.js';
import { Evaluation, isSameFormat } from '../../shared/types/evaluation.js';
import { Trigger } from '../../shared/types/interfaces.js';
import { EvaluatorError, EvaluatorStateError } from '../evaluators/errors.js';

/**
 * Snapshot of one selection, safe to hand to UI or analytics
 */
export interface FormatSelection {
  readonly format: Format;
  readonly trigger: number;
  readonly queueSize: number;
  /** Buffered chunks the caller should drop from the tail of its queue */
  readonly discardCount: number;
}

/**
 * Brackets one evaluator and one Evaluation for a single track
 *
 * Use one session per track. The session is driven by the host's buffering loop
 * and never performs I/O itself.
 */
export class AdaptationSession {
  private readonly evaluator: FormatEvaluator;
  private readonly evaluation = new Evaluation();
  private active = false;

  constructor(evaluator: FormatEvaluator) {
    this.evaluator = evaluator;
  }

  /**
   * Enable the evaluator, run body, and disable it however body ends
   */
  static async run<T>(
    evaluator: FormatEvaluator,
    body: (session: AdaptationSession) => T | Promise<T>,
  ): Promise<T> {
    const session = new AdaptationSession(evaluator);
    session.start();
    try {
      return await body(session);
    } finally {
      session.stop();
    }
  }

  start(): void {
    if (this.active)
      return;
    this.evaluator.enable();
    this.active = true;
  }

  stop(): void {
    if (!this.active)
      return;
    this.active = false;
    this.evaluator.disable();
  }

  isActive(): boolean {
    return this.active;
  }

  /**
   * Decide the format for the next chunk
   */
  select(queue: readonly MediaChunk[], playbackPositionUs: number, formats: readonly Format[]): FormatSelection {
    if (!this.active) {
      throw new EvaluatorStateError('select called on a session that is not started');
    }

    this.evaluation.queueSize = queue.length;
    this.evaluator.evaluate(queue, playbackPositionUs, formats, this.evaluation);

    const format = this.evaluation.format;
    if (format === null) {
      throw new EvaluatorError('evaluator returned without selecting a format');
    }

    return {
      format,
      trigger: this.evaluation.trigger,
      queueSize: this.evaluation.queueSize,
      discardCount: Math.max(0, queue.length - this.evaluation.queueSize),
    };
  }

  /**
   * Record a user initiated selection. The trigger becomes MANUAL only if the format changed
   */
  selectManually(format: Format): void {
    if (!isSameFormat(this.evaluation.format, format)) {
      this.evaluation.trigger = Trigger.MANUAL;
    }
    this.evaluation.format = format;
  }

  getEvaluation(): Readonly<Evaluation> {
    return this.evaluation;
  }
}
