import type { Format } from './interfaces.js';
import { Trigger } from './interfaces.js';

/**
 * A format evaluation, owned by the caller and passed to every evaluate call
 *
 * The trigger is sticky for as long as a given format is selected: evaluators
 * only change it in the same call that changes the format.
 */
export class Evaluation {
  /** The desired size of the queue. Evaluators may shrink it to request a discard */
  queueSize = 0;

  /** The sticky reason for the format selection */
  trigger: number = Trigger.INITIAL;

  /** The selected format, null before the first evaluation */
  format: Format | null = null;
}

/**
 * Whether two format references denote the same variant
 */
export function isSameFormat(a: Format | null, b: Format | null): boolean {
  if (a === null || b === null)
    return a === b;
  return a.id === b.id;
}
