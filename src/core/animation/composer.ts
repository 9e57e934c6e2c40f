/**
 * Multi-Spring Composer
 *
 * Runs several independent springs on a shared frame clock. Each channel
 * chases its own target:
 *
 *   target = base * baseScale + amplitude * sin(frame * rate)
 *
 * where base is the shared target unless the caller overrides it for that
 * channel.
 */

import { createSpring, restingSpring, stepSpring, type Spring } from '../math/spring';
import type { CompositeState, SpringParameters, SpringState } from '../models/types';

export interface TargetDrive {
  baseScale: number;
  amplitude: number;
  rate: number;       // radians per frame
}

export interface ChannelSpec {
  params: SpringParameters;
  drive: TargetDrive;
}

type Channel = {
  spring: Spring;
  drive: TargetDrive;
  state: SpringState;
};

export const FOLLOW_BASE: TargetDrive = Object.freeze({ baseScale: 1, amplitude: 0, rate: 0 });

export function channelTarget(drive: TargetDrive, base: number, frame: number): number {
  const perturbation = drive.amplitude === 0 ? 0 : drive.amplitude * Math.sin(frame * drive.rate);
  return base * drive.baseScale + perturbation;
}

export function channelState<K extends string>(composite: CompositeState<K>, name: K): SpringState {
  const state = composite.channels.get(name);
  if (!state) {
    throw new Error(`Unknown spring channel: ${name}`);
  }
  return state;
}

export class SpringComposer<K extends string> {
  private readonly channels = new Map<K, Channel>();
  private frame = 0;

  constructor(specs: ReadonlyArray<readonly [K, ChannelSpec]>) {
    if (specs.length === 0) {
      throw new Error('SpringComposer needs at least one channel');
    }

    for (const [name, spec] of specs) {
      if (this.channels.has(name)) {
        throw new Error(`Duplicate spring channel: ${name}`);
      }
      this.channels.set(name, {
        spring: createSpring(spec.params),
        drive: spec.drive,
        state: restingSpring(),
      });
    }
  }

  /**
   * Advance the frame clock and every channel by exactly one step.
   */
  step(baseTarget: number, overrides: Partial<Record<K, number>> = {}): void {
    this.frame++;

    for (const [name, channel] of this.channels) {
      const base = overrides[name] ?? baseTarget;
      const target = channelTarget(channel.drive, base, this.frame);
      channel.state = stepSpring({ ...channel.state, target }, channel.spring);
    }
  }

  channel(name: K): SpringState {
    const channel = this.channels.get(name);
    if (!channel) {
      throw new Error(`Unknown spring channel: ${name}`);
    }
    return channel.state;
  }

  getFrame(): number {
    return this.frame;
  }

  snapshot(): CompositeState<K> {
    const channels = new Map<K, SpringState>();
    for (const [name, channel] of this.channels) {
      channels.set(name, channel.state);
    }
    return Object.freeze({ frame: this.frame, channels });
  }

  reset(target = 0): void {
    this.frame = 0;
    for (const channel of this.channels.values()) {
      channel.state = restingSpring(target);
    }
  }
}
