export type SpringState = {
  position: number;
  velocity: number;
  target: number;
};

export type SpringParameters = {
  angularFrequency: number;
  dampingRatio: number;
  sampleRate: number; // steps per second
};

/**
 * Frames ordered from one extreme (index 0, contracted / exhaled)
 * to the other (index N-1, expanded / inhaled).
 */
export type Frame = readonly string[];
export type FrameSet = readonly Frame[];

export type CycleState = {
  cycleCount: number;
  targetSign: -1 | 1;
};

export type ExerciseKind = 'strength' | 'meditation';

export const EXERCISE_KINDS: readonly ExerciseKind[] = ['strength', 'meditation'];

export type BreathPhase = 'inhale' | 'hold' | 'exhale' | 'pause';

export type CompositeState<K extends string> = {
  frame: number;
  channels: ReadonlyMap<K, SpringState>;
};

export type TiltIndicator = '↗' | '↖' | null;

export type StrengthRenderHints = {
  padding: number;
  linePadding: number;
  tilt: TiltIndicator;
  intensity: number;
  label: { key: 'peak_activation' | 'engaged'; indent: number } | null;
};

export type HeartGlyph = '♡' | '💗' | '💖';

export type MeditationRenderHints = {
  padding: number;
  heart: HeartGlyph;
};

export type FrameSelection<H> = {
  frameIndex: number;
  frame: Frame;
  hints: H;
};
