import { SpringComposer, FOLLOW_BASE, type ChannelSpec } from '../animation/composer';
import { OscillationCycle } from '../animation/cycle';
import { deriveStrengthHints, mapToFrame, type StrengthChannel } from '../animation/frameMapper';
import type { AnimationConfig } from '../config/animation';
import type { TextProvider } from '../i18n/localizer';
import type { CompositeState, FrameSelection, FrameSet, StrengthRenderHints } from '../models/types';
import type { Exercise } from './exercise';
import { GLUTE_FRAMES } from './frames';

/**
 * Spring channels for the glute squeeze. Left and right run slightly
 * faster/slower than main and wobble around its target, breath drifts on
 * its own slow sine, tension overshoots main by 20% with stiffer damping.
 */
export function strengthChannels(config: AnimationConfig): Array<[StrengthChannel, ChannelSpec]> {
  const { angularFrequency: omega, dampingRatio: zeta, fps: sampleRate } = config;

  return [
    ['main', {
      params: { angularFrequency: omega, dampingRatio: zeta, sampleRate },
      drive: FOLLOW_BASE,
    }],
    ['left', {
      params: { angularFrequency: omega * 1.1, dampingRatio: zeta * 0.9, sampleRate },
      drive: { baseScale: 1, amplitude: 0.5, rate: 0.02 },
    }],
    ['right', {
      params: { angularFrequency: omega * 0.9, dampingRatio: zeta * 1.1, sampleRate },
      drive: { baseScale: 1, amplitude: 0.4, rate: 0.018 },
    }],
    ['breath', {
      params: { angularFrequency: 1.5, dampingRatio: 0.8, sampleRate },
      drive: { baseScale: 0, amplitude: 2.0, rate: 0.01 },
    }],
    ['tension', {
      params: { angularFrequency: omega * 2, dampingRatio: zeta * 2, sampleRate },
      drive: { baseScale: 1.2, amplitude: 0, rate: 0 },
    }],
  ];
}

export class StrengthExercise implements Exercise {
  readonly kind = 'strength' as const;
  readonly name = 'Glute Squeeze';
  readonly description = 'Rhythmic glute squeeze and lift with animated guidance';

  private readonly composer: SpringComposer<StrengthChannel>;
  private readonly cycle: OscillationCycle;

  constructor(
    private readonly text: TextProvider,
    private readonly config: AnimationConfig,
    private readonly frames: FrameSet = GLUTE_FRAMES
  ) {
    this.composer = new SpringComposer(strengthChannels(config));
    this.cycle = new OscillationCycle(config.range, config.settleThreshold);
  }

  /**
   * One tick: every spring steps toward the cycle's current target, then
   * the main spring is checked for settling.
   * @returns true when the target flipped this tick
   */
  update(): boolean {
    this.composer.step(this.cycle.getTarget());
    return this.cycle.advance(this.composer.channel('main'));
  }

  select(): FrameSelection<StrengthRenderHints> {
    const range = this.config.range;
    return mapToFrame(this.composer.snapshot(), this.frames, {
      primary: 'main',
      range,
      deriveHints: (composite) => deriveStrengthHints(composite, range),
    });
  }

  render(): string[] {
    const { frame, hints } = this.select();
    const padding = ' '.repeat(hints.linePadding);
    const tilt = hints.tilt ? ` ${hints.tilt}` : '';

    const lines = frame.map((line) => `${padding}${line}${tilt}`);
    if (hints.label) {
      lines.push(' '.repeat(hints.label.indent) + this.text.lookup(hints.label.key));
    }
    return lines;
  }

  getInstructions(): string {
    // Two settles squeezing, two lifting
    return this.cycle.getCycleCount() % 4 < 2
      ? this.text.lookup('squeeze_instruction')
      : this.text.lookup('lift_instruction');
  }

  getTips(): string[] {
    return ['tip_follow_rhythm', 'tip_squeeze', 'tip_lift', 'tip_core', 'tip_exit']
      .map((key) => this.text.lookup(key));
  }

  getCounter(): string {
    return this.text.lookupFormatted('rep_counter', Math.floor(this.cycle.getCycleCount() / 2) + 1);
  }

  isComplete(): boolean {
    return false;
  }

  reset() {
    this.cycle.reset();
    this.composer.reset();
  }

  getCycleCount(): number {
    return this.cycle.getCycleCount();
  }

  getTarget(): number {
    return this.cycle.getTarget();
  }

  snapshot(): CompositeState<StrengthChannel> {
    return this.composer.snapshot();
  }
}
