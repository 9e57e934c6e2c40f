/**
 * 4-7-8 breathing sequence: inhale 4 s, hold 7 s, exhale 8 s, pause 2 s.
 * Durations are counted in ticks so the sequence stays in step with the
 * animation clock.
 */

import type { BreathPhase } from '../models/types';

export const BREATH_PHASE_ORDER: readonly BreathPhase[] = ['inhale', 'hold', 'exhale', 'pause'];

export type BreathDurations = Record<BreathPhase, number>;

export const DEFAULT_BREATH_SECONDS: Readonly<BreathDurations> = Object.freeze({
  inhale: 4,
  hold: 7,
  exhale: 8,
  pause: 2,
});

export function durationsInTicks(seconds: BreathDurations, fps: number): BreathDurations {
  return {
    inhale: Math.round(seconds.inhale * fps),
    hold: Math.round(seconds.hold * fps),
    exhale: Math.round(seconds.exhale * fps),
    pause: Math.round(seconds.pause * fps),
  };
}

export function nextPhase(phase: BreathPhase): BreathPhase {
  const index = BREATH_PHASE_ORDER.indexOf(phase);
  return BREATH_PHASE_ORDER[(index + 1) % BREATH_PHASE_ORDER.length];
}

export type PhaseTransition = { from: BreathPhase; to: BreathPhase };

export class BreathPhaseSequencer {
  private phase: BreathPhase = 'inhale';
  private timer = 0;
  private breathCycles = 0;

  constructor(private readonly durations: BreathDurations) {
    for (const phase of BREATH_PHASE_ORDER) {
      if (!Number.isInteger(durations[phase]) || durations[phase] < 1) {
        throw new Error(`Breath phase "${phase}" needs a duration of at least one tick`);
      }
    }
  }

  /**
   * Advance the phase timer by one tick.
   * @returns the transition taken this tick, or null
   */
  tick(): PhaseTransition | null {
    this.timer++;
    if (this.timer < this.durations[this.phase]) {
      return null;
    }

    const from = this.phase;
    this.phase = nextPhase(from);
    this.timer = 0;

    // One full traversal counts when the exhale ends
    if (from === 'exhale') {
      this.breathCycles++;
    }

    return { from, to: this.phase };
  }

  getPhase(): BreathPhase {
    return this.phase;
  }

  getTimer(): number {
    return this.timer;
  }

  getBreathCycles(): number {
    return this.breathCycles;
  }

  reset() {
    this.phase = 'inhale';
    this.timer = 0;
    this.breathCycles = 0;
  }
}
