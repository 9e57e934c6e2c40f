/**
 * Oscillation Cycle
 *
 * Retargets the primary spring between -range and +range:
 * 1. SETTLING: spring moves toward the current target
 * 2. Settled (|error| < eps AND |velocity| < eps) → RETARGETING
 * 3. RETARGETING: cycle count +1, target sign flips → back to SETTLING
 *
 * A spring swinging through its target at speed is not settled.
 */

import { isSettled } from '../math/spring';
import type { CycleState, SpringState } from '../models/types';

export function targetSignFor(cycleCount: number): -1 | 1 {
  return cycleCount % 2 === 0 ? -1 : 1;
}

export class OscillationCycle {
  private cycleCount = 0;

  constructor(
    private readonly range: number,
    private readonly threshold: number
  ) {}

  getTarget(): number {
    return targetSignFor(this.cycleCount) * this.range;
  }

  /**
   * Check the primary channel against the current target.
   * @returns true when the spring settled and the target flipped this tick
   */
  advance(primary: SpringState): boolean {
    const settled = isSettled({ ...primary, target: this.getTarget() }, this.threshold);
    if (!settled) return false;

    this.cycleCount++;
    return true;
  }

  getState(): CycleState {
    return { cycleCount: this.cycleCount, targetSign: targetSignFor(this.cycleCount) };
  }

  getCycleCount(): number {
    return this.cycleCount;
  }

  reset() {
    this.cycleCount = 0;
  }
}
