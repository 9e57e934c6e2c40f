import gluteFrames from './frames/glute.json';
import breathFrames from './frames/breath.json';
import type { FrameSet } from '../models/types';

export function createFrameSet(frames: readonly (readonly string[])[], name: string): FrameSet {
  if (frames.length === 0) {
    throw new Error(`Frame set "${name}" has no frames`);
  }
  frames.forEach((frame, index) => {
    if (frame.length === 0) {
      throw new Error(`Frame set "${name}": frame ${index} has no lines`);
    }
  });
  return Object.freeze(frames.map((frame) => Object.freeze([...frame])));
}

// Index 0 is fully contracted, last is fully expanded
export const GLUTE_FRAMES: FrameSet = createFrameSet(gluteFrames, 'glute');

// Index 0 is exhaled, last is fully inhaled
export const BREATH_FRAMES: FrameSet = createFrameSet(breathFrames, 'breath');
