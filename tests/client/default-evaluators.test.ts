import { describe, expect, it } from 'vitest';
import { FixedEvaluator, LoopEvaluator, RandomEvaluator } from '../../src/client/evaluators/default.js';
import { EvaluatorConfigError, EvaluatorError, FormatNotFoundError } from '../../src/client/evaluators/errors.js';
import type { EvaluationEvent } from '../../src/client/types/evaluators.js';
import { Evaluation } from '../../src/shared/types/evaluation.js';
import type { Format } from '../../src/shared/types/interfaces.js';
import { Trigger } from '../../src/shared/types/interfaces.js';
import type { RandomSource } from '../../src/shared/utils/random.js';
import { FORMAT_360, FORMAT_480, FORMAT_720, LADDER, queueOf } from '../helpers/fixtures.js';

/** Replays a fixed list of indices */
function scriptedRandom(indices: number[]): RandomSource {
  let position = 0;
  return {
    nextInt: () => indices[position++ % indices.length],
  };
}

function selectionsOf(evaluator: { evaluate: LoopEvaluator['evaluate'] }, calls: number, formats: readonly Format[]): string[] {
  const evaluation = new Evaluation();
  const ids: string[] = [];
  for (let i = 0; i < calls; i++) {
    evaluator.evaluate([], 0, formats, evaluation);
    ids.push(evaluation.format?.id ?? '');
  }
  return ids;
}

describe('FixedEvaluator', () => {
  it('should select the format with the configured height', () => {
    const evaluation = new Evaluation();
    new FixedEvaluator({ height: 480 }).evaluate([], 0, LADDER, evaluation);
    expect(evaluation.format).toBe(FORMAT_480);
  });

  it('should select the lowest quality for height 0', () => {
    const evaluation = new Evaluation();
    new FixedEvaluator().evaluate([], 0, LADDER, evaluation);
    expect(evaluation.format).toBe(FORMAT_360);
  });

  it('should prefer the lowest bitrate among formats sharing a height', () => {
    const highBitrate480: Format = { id: 'B+', bitrate: 1_500_000, width: 854, height: 480 };
    const evaluation = new Evaluation();
    new FixedEvaluator({ height: 480 }).evaluate([], 0, [FORMAT_720, highBitrate480, FORMAT_480, FORMAT_360], evaluation);
    expect(evaluation.format).toBe(FORMAT_480);
  });

  it('should fall back to the nearest height when nothing matches', () => {
    const evaluation = new Evaluation();
    new FixedEvaluator({ height: 1080 }).evaluate([], 0, LADDER, evaluation);
    expect(evaluation.format).toBe(FORMAT_720);
  });

  it('should break nearest height ties towards the lower bitrate', () => {
    const evaluation = new Evaluation();
    // 600 is 120 away from both 720 and 480
    new FixedEvaluator({ height: 600 }).evaluate([], 0, LADDER, evaluation);
    expect(evaluation.format).toBe(FORMAT_480);
  });

  it('should throw for an unmatched height with the error fallback', () => {
    const evaluator = new FixedEvaluator({ height: 1080, fallback: 'error' });
    const evaluation = new Evaluation();

    expect(() => evaluator.evaluate([], 0, LADDER, evaluation)).toThrow(FormatNotFoundError);
    expect(evaluation.format).toBeNull();
  });

  it('should validate a catalog up front', () => {
    expect(() => new FixedEvaluator({ height: 480 }).validate(LADDER)).not.toThrow();
    expect(() => new FixedEvaluator().validate(LADDER)).not.toThrow();

    let caught: unknown;
    try {
      new FixedEvaluator({ height: 1080 }).validate(LADDER);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(FormatNotFoundError);
    const error = caught instanceof FormatNotFoundError ? caught : null;
    expect(error?.name).toBe('FormatNotFoundError');
    expect(error?.height).toBe(1080);
    expect(error?.message).toBe('No format with height 1080');
  });

  it('should leave the trigger and queue size untouched', () => {
    const evaluation = new Evaluation();
    evaluation.format = FORMAT_720;
    evaluation.trigger = Trigger.MANUAL;
    evaluation.queueSize = 4;

    new FixedEvaluator({ height: 360 }).evaluate(queueOf(FORMAT_720, 4, 5_000), 0, LADDER, evaluation);

    expect(evaluation.format).toBe(FORMAT_360);
    expect(evaluation.trigger).toBe(Trigger.MANUAL);
    expect(evaluation.queueSize).toBe(4);
  });

  it('should reject invalid heights', () => {
    expect(() => new FixedEvaluator({ height: -1 })).toThrow(EvaluatorConfigError);
    expect(() => new FixedEvaluator({ height: 480.5 })).toThrow(EvaluatorConfigError);
  });

  it('should reject an empty format list', () => {
    expect(() => new FixedEvaluator().evaluate([], 0, [], new Evaluation())).toThrow(EvaluatorError);
  });
});

describe('RandomEvaluator', () => {
  it('should mark a changed pick as adaptive', () => {
    const evaluator = new RandomEvaluator({ random: scriptedRandom([0, 0, 2]) });
    const evaluation = new Evaluation();

    evaluator.evaluate([], 0, LADDER, evaluation);
    expect(evaluation.format).toBe(FORMAT_720);
    expect(evaluation.trigger).toBe(Trigger.INITIAL);

    evaluator.evaluate([], 0, LADDER, evaluation);
    expect(evaluation.format).toBe(FORMAT_720);
    expect(evaluation.trigger).toBe(Trigger.INITIAL);

    evaluator.evaluate([], 0, LADDER, evaluation);
    expect(evaluation.format).toBe(FORMAT_360);
    expect(evaluation.trigger).toBe(Trigger.ADAPTIVE);
  });

  it('should compare formats by id', () => {
    const evaluator = new RandomEvaluator({ random: scriptedRandom([1]) });
    const evaluation = new Evaluation();
    evaluation.format = { ...FORMAT_480 };

    evaluator.evaluate([], 0, LADDER, evaluation);

    expect(evaluation.format).toBe(FORMAT_480);
    expect(evaluation.trigger).toBe(Trigger.INITIAL);
  });

  it('should be reproducible for a given seed', () => {
    expect(selectionsOf(new RandomEvaluator({ seed: 42 }), 20, LADDER))
      .toEqual(selectionsOf(new RandomEvaluator({ seed: 42 }), 20, LADDER));
  });

  it('should only pick formats from the list', () => {
    const ids = selectionsOf(new RandomEvaluator({ seed: 7 }), 50, LADDER);
    for (const id of ids) {
      expect(['A', 'B', 'C']).toContain(id);
    }
  });

  it('should not touch the queue size', () => {
    const evaluation = new Evaluation();
    evaluation.queueSize = 7;
    new RandomEvaluator({ seed: 1 }).evaluate(queueOf(FORMAT_360, 7, 5_000), 0, LADDER, evaluation);
    expect(evaluation.queueSize).toBe(7);
  });
});

describe('LoopEvaluator', () => {
  it('should advance through formats from lowest to highest every third call', () => {
    expect(selectionsOf(new LoopEvaluator(), 10, LADDER))
      .toEqual(['C', 'C', 'C', 'B', 'B', 'B', 'A', 'A', 'A', 'C']);
  });

  it('should advance the cursor on the third call for the next triple', () => {
    const evaluator = new LoopEvaluator();
    const evaluation = new Evaluation();

    evaluator.evaluate([], 0, LADDER, evaluation);
    evaluator.evaluate([], 0, LADDER, evaluation);
    expect(evaluator.getCursor()).toBe(0);

    evaluator.evaluate([], 0, LADDER, evaluation);
    expect(evaluation.format).toBe(FORMAT_360);
    expect(evaluator.getCursor()).toBe(1);
  });

  it('should keep cursor state per instance', () => {
    const first = new LoopEvaluator();
    const second = new LoopEvaluator();

    selectionsOf(first, 3, LADDER);

    expect(first.getCursor()).toBe(1);
    expect(second.getCursor()).toBe(0);
    expect(selectionsOf(second, 1, LADDER)).toEqual(['C']);
  });

  it('should honour a custom switch interval', () => {
    expect(selectionsOf(new LoopEvaluator({ switchInterval: 1 }), 4, LADDER)).toEqual(['C', 'B', 'A', 'C']);
  });

  it('should set the adaptive trigger only when the format changes', () => {
    const evaluator = new LoopEvaluator();
    const evaluation = new Evaluation();
    const triggers: number[] = [];
    for (let i = 0; i < 4; i++) {
      evaluator.evaluate([], 0, LADDER, evaluation);
      triggers.push(evaluation.trigger);
    }
    expect(triggers).toEqual([Trigger.INITIAL, Trigger.INITIAL, Trigger.INITIAL, Trigger.ADAPTIVE]);
  });

  it('should start over after reset', () => {
    const evaluator = new LoopEvaluator({ switchInterval: 1 });
    selectionsOf(evaluator, 2, LADDER);
    evaluator.reset();
    expect(evaluator.getCursor()).toBe(0);
    expect(selectionsOf(evaluator, 1, LADDER)).toEqual(['C']);
  });

  it('should reject a non-positive switch interval', () => {
    expect(() => new LoopEvaluator({ switchInterval: 0 })).toThrow(EvaluatorConfigError);
  });

  it('should dispatch evaluation events', () => {
    const evaluator = new LoopEvaluator();
    const events: EvaluationEvent[] = [];
    evaluator.addEventListener('evaluation', (event) => {
      if (event instanceof CustomEvent)
        events.push(event.detail);
    });

    selectionsOf(evaluator, 1, LADDER);

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      evaluatorId: evaluator.id,
      evaluator: 'LoopEvaluator',
      formatId: 'C',
      previousFormatId: null,
      trigger: Trigger.INITIAL,
      queueSize: 0,
    });
  });
});
