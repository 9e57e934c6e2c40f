import { validateSpringParameters } from '../math/spring';

export interface AnimationConfig {
  fps: number;
  angularFrequency: number;   // primary channel, rad/s
  dampingRatio: number;       // primary channel
  range: number;              // physical half-range R; positions map from [-R, +R]
  settleThreshold: number;    // epsilon for |error| and |velocity|
}

export const DEFAULT_ANIMATION_CONFIG: Readonly<AnimationConfig> = Object.freeze({
  fps: 30,
  angularFrequency: 4.0,
  dampingRatio: 0.3,
  range: 8.0,
  settleThreshold: 0.5,
});

export function validateAnimationConfig(config: AnimationConfig): string | null {
  const springError = validateSpringParameters({
    angularFrequency: config.angularFrequency,
    dampingRatio: config.dampingRatio,
    sampleRate: config.fps,
  });
  if (springError) {
    return springError.replace('sampleRate', 'fps');
  }
  if (!Number.isFinite(config.range) || config.range <= 0) {
    return `range must be a positive number (got ${config.range})`;
  }
  if (!Number.isFinite(config.settleThreshold) || config.settleThreshold <= 0) {
    return `settleThreshold must be a positive number (got ${config.settleThreshold})`;
  }
  return null;
}

export function createAnimationConfig(overrides: Partial<AnimationConfig> = {}): Readonly<AnimationConfig> {
  const config = { ...DEFAULT_ANIMATION_CONFIG, ...overrides };
  const error = validateAnimationConfig(config);
  if (error) {
    throw new Error(`Invalid animation config: ${error}`);
  }
  return Object.freeze(config);
}
