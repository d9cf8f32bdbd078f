import { MAX_TIMER_MS } from '../../config/constants';

export type CountdownValue =
  | { kind: 'unarmed' }
  | { kind: 'armed'; ms: number };

const UNARMED: CountdownValue = { kind: 'unarmed' };

/**
 * Time left until the scheduler synthesizes a Timeout event.
 *
 * Owned by the scheduler and handed to actions through their context.
 * Every write replaces the previous value (no merging, no queueing).
 */
export class Countdown {
  private value: CountdownValue = UNARMED;
  private writes = 0;

  /**
   * Arm the countdown. `0` fires on the next wait, which is not the same as unarmed.
   */
  arm(ms: number): void {
    if (!Number.isInteger(ms) || ms < 0 || ms > MAX_TIMER_MS) {
      throw new RangeError(`Timer duration must be an integer between 0 and ${MAX_TIMER_MS}, got ${ms}`);
    }
    this.value = { kind: 'armed', ms };
    this.writes++;
  }

  disarm(): void {
    this.value = UNARMED;
    this.writes++;
  }

  read(): CountdownValue {
    return this.value;
  }

  isArmed(): boolean {
    return this.value.kind === 'armed';
  }

  /**
   * Bumped on every arm/disarm, so callers can tell whether anything wrote
   * to the countdown since they last looked.
   */
  get generation(): number {
    return this.writes;
  }
}

export function formatCountdown(value: CountdownValue): string {
  return value.kind === 'armed' ? `${value.ms}ms` : 'unarmed';
}
