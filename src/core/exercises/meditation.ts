import {
  BreathPhaseSequencer,
  DEFAULT_BREATH_SECONDS,
  durationsInTicks,
  type BreathDurations,
  type PhaseTransition,
} from '../animation/breathPhases';
import { SpringComposer, FOLLOW_BASE, type ChannelSpec } from '../animation/composer';
import { deriveMeditationHints, mapToFrame, type MeditationChannel } from '../animation/frameMapper';
import type { AnimationConfig } from '../config/animation';
import type { TextProvider } from '../i18n/localizer';
import type {
  BreathPhase,
  CompositeState,
  FrameSelection,
  FrameSet,
  MeditationRenderHints,
} from '../models/types';
import type { Exercise } from './exercise';
import { BREATH_FRAMES } from './frames';

export function meditationChannels(config: AnimationConfig): Array<[MeditationChannel, ChannelSpec]> {
  const sampleRate = config.fps;

  return [
    ['breath', { params: { angularFrequency: 0.8, dampingRatio: 0.9, sampleRate }, drive: FOLLOW_BASE }],
    ['lung', { params: { angularFrequency: 1.0, dampingRatio: 0.8, sampleRate }, drive: FOLLOW_BASE }],
    ['heart', {
      params: { angularFrequency: 0.5, dampingRatio: 0.95, sampleRate },
      drive: { baseScale: 0, amplitude: 4.0, rate: 0.005 },
    }],
  ];
}

export type PhaseTargets = { breath: number; lung: number };

export function phaseTargets(phase: BreathPhase, range: number): PhaseTargets {
  switch (phase) {
    case 'inhale':
    case 'hold':
      return { breath: range, lung: range * 0.8 };
    case 'exhale':
    case 'pause':
      return { breath: -range, lung: -range * 0.6 };
  }
}

const PHASE_INDICATORS: Record<BreathPhase, { arrow: string; key: string }> = {
  inhale: { arrow: '↑', key: 'inhaling' },
  hold: { arrow: '⏸', key: 'holding' },
  exhale: { arrow: '↓', key: 'exhaling' },
  pause: { arrow: '⏹', key: 'pausing' },
};

const PHASE_INSTRUCTIONS: Record<BreathPhase, string> = {
  inhale: 'breathe_in_instruction',
  hold: 'hold_breath_instruction',
  exhale: 'breathe_out_instruction',
  pause: 'pause_instruction',
};

export class MeditationExercise implements Exercise {
  readonly kind = 'meditation' as const;
  readonly name = 'Deep Breathing';
  readonly description = 'Guided 4-7-8 breathing for relaxation';

  private readonly composer: SpringComposer<MeditationChannel>;
  private readonly sequencer: BreathPhaseSequencer;

  constructor(
    private readonly text: TextProvider,
    private readonly config: AnimationConfig,
    breathSeconds: BreathDurations = DEFAULT_BREATH_SECONDS,
    private readonly frames: FrameSet = BREATH_FRAMES
  ) {
    this.composer = new SpringComposer(meditationChannels(config));
    this.sequencer = new BreathPhaseSequencer(durationsInTicks(breathSeconds, config.fps));
  }

  /**
   * One tick: advance the phase timer, then step the springs toward the
   * targets of the phase the tick started in. A new phase's targets apply
   * from the following tick.
   */
  update(): PhaseTransition | null {
    const targets = phaseTargets(this.sequencer.getPhase(), this.config.range);
    const transition = this.sequencer.tick();
    this.composer.step(targets.breath, { lung: targets.lung });
    return transition;
  }

  select(): FrameSelection<MeditationRenderHints> {
    return mapToFrame(this.composer.snapshot(), this.frames, {
      primary: 'breath',
      range: this.config.range,
      deriveHints: deriveMeditationHints,
    });
  }

  render(): string[] {
    const { frame, hints } = this.select();
    const padding = ' '.repeat(hints.padding);
    const indicator = PHASE_INDICATORS[this.sequencer.getPhase()];

    return frame.map((line, index) => {
      let out = line.replaceAll('♡', hints.heart);
      if (index === 0) {
        out += `  ${indicator.arrow} ${this.text.lookup(indicator.key)}`;
      }
      return padding + out;
    });
  }

  getInstructions(): string {
    return this.text.lookup(PHASE_INSTRUCTIONS[this.sequencer.getPhase()]);
  }

  getTips(): string[] {
    return ['tip_breathe_478', 'tip_inhale', 'tip_hold', 'tip_exhale', 'tip_pause', 'tip_focus', 'tip_exit']
      .map((key) => this.text.lookup(key));
  }

  getCounter(): string {
    return this.text.lookupFormatted('breath_counter', this.sequencer.getBreathCycles());
  }

  isComplete(): boolean {
    return false;
  }

  reset() {
    this.sequencer.reset();
    this.composer.reset();
  }

  getPhase(): BreathPhase {
    return this.sequencer.getPhase();
  }

  getBreathCycles(): number {
    return this.sequencer.getBreathCycles();
  }

  snapshot(): CompositeState<MeditationChannel> {
    return this.composer.snapshot();
  }
}
