/**
 * State-to-Frame Mapping
 *
 * Turns continuous spring state into something printable: a frame index
 * into a pre-authored FrameSet plus small integer render hints (padding,
 * tilt, labels). Spring overshoot can leave [-R, +R], so normalisation
 * clamps before quantising.
 *
 * Offsets truncate toward zero and the frame index floors.
 */

import { channelState } from './composer';
import type {
  CompositeState,
  FrameSelection,
  FrameSet,
  HeartGlyph,
  MeditationRenderHints,
  StrengthRenderHints,
  TiltIndicator,
} from '../models/types';

export const STRENGTH_HINTS = Object.freeze({
  basePadding: 15,
  minPadding: 5,
  maxPadding: 25,
  sideScale: 0.3,
  breathScale: 0.5,
  tiltThreshold: 1.0,
  engagedThreshold: 0.5,
  peakThreshold: 0.8,
  engagedIndent: 10,
  peakIndent: 8,
});

export const MEDITATION_HINTS = Object.freeze({
  basePadding: 10,
  minPadding: 5,
  maxPadding: 20,
  lungScale: 0.2,
  heartScale: 0.1,
  strongBeat: 3.0,
  mediumBeat: 1.0,
});

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Map a position in [-range, +range] to [0, 1], clamping outside.
 */
export function normalizePosition(position: number, range: number): number {
  return clamp((position + range) / (2 * range), 0, 1);
}

export function frameIndexFor(normalized: number, frameCount: number): number {
  if (frameCount <= 0) {
    throw new Error('Frame set is empty');
  }
  const index = Math.floor(normalized * (frameCount - 1));
  return clamp(index, 0, frameCount - 1);
}

export interface MapOptions<K extends string, H> {
  primary: K;
  range: number;
  deriveHints: (composite: CompositeState<K>) => H;
}

export function mapToFrame<K extends string, H>(
  composite: CompositeState<K>,
  frameSet: FrameSet,
  options: MapOptions<K, H>
): FrameSelection<H> {
  const normalized = normalizePosition(channelState(composite, options.primary).position, options.range);
  const frameIndex = frameIndexFor(normalized, frameSet.length);

  return {
    frameIndex,
    frame: frameSet[frameIndex],
    hints: options.deriveHints(composite),
  };
}

export type StrengthChannel = 'main' | 'left' | 'right' | 'breath' | 'tension';
export type MeditationChannel = 'breath' | 'lung' | 'heart';

export function tiltBetween(left: number, right: number): TiltIndicator {
  if (Math.abs(left - right) <= STRENGTH_HINTS.tiltThreshold) return null;
  return left > right ? '↗' : '↖';
}

export function deriveStrengthHints(
  composite: CompositeState<StrengthChannel>,
  range: number
): StrengthRenderHints {
  const left = channelState(composite, 'left').position;
  const right = channelState(composite, 'right').position;
  const breath = channelState(composite, 'breath').position;
  const tension = channelState(composite, 'tension').position;

  const leftOffset = Math.trunc(left * STRENGTH_HINTS.sideScale);
  const rightOffset = Math.trunc(right * STRENGTH_HINTS.sideScale);
  const breathOffset = Math.trunc(breath * STRENGTH_HINTS.breathScale);

  const padding = clamp(
    STRENGTH_HINTS.basePadding + breathOffset + leftOffset - rightOffset,
    STRENGTH_HINTS.minPadding,
    STRENGTH_HINTS.maxPadding
  );
  const linePadding = Math.max(0, padding + Math.trunc((leftOffset - rightOffset) / 2));

  const intensity = normalizePosition(tension, range);
  let label: StrengthRenderHints['label'] = null;
  if (intensity > STRENGTH_HINTS.peakThreshold) {
    label = { key: 'peak_activation', indent: padding + STRENGTH_HINTS.peakIndent };
  } else if (intensity > STRENGTH_HINTS.engagedThreshold) {
    label = { key: 'engaged', indent: padding + STRENGTH_HINTS.engagedIndent };
  }

  return {
    padding,
    linePadding,
    tilt: tiltBetween(left, right),
    intensity,
    label,
  };
}

export function heartGlyphFor(heart: number): HeartGlyph {
  if (heart > MEDITATION_HINTS.strongBeat) return '💖';
  if (heart > MEDITATION_HINTS.mediumBeat) return '💗';
  return '♡';
}

export function deriveMeditationHints(composite: CompositeState<MeditationChannel>): MeditationRenderHints {
  const lung = channelState(composite, 'lung').position;
  const heart = channelState(composite, 'heart').position;

  const padding = clamp(
    MEDITATION_HINTS.basePadding
      + Math.trunc(lung * MEDITATION_HINTS.lungScale)
      + Math.trunc(heart * MEDITATION_HINTS.heartScale),
    MEDITATION_HINTS.minPadding,
    MEDITATION_HINTS.maxPadding
  );

  return { padding, heart: heartGlyphFor(heart) };
}
